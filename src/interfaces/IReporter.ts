import { CleanupRunResult, CleanupScope, RunMode } from '../types';
import { ILogger } from './ILogger';

/**
 * Interface for reporting and logging operations
 */
export interface IReporter extends ILogger {
  logRunStart(mode: RunMode, scope: CleanupScope): void;

  logRunComplete(result: CleanupRunResult): void;

  /**
   * Plain-text summary of a run
   */
  generateSummary(result: CleanupRunResult): string;
}
