import { CleanupOptions, CleanupRunResult, CleanupScope } from '../types';

/**
 * Interface for cleanup orchestration
 */
export interface ICleanupOrchestrator {
  /**
   * Run every selected cleaner in the configured mode
   */
  executeCleanup(scope: CleanupScope, signal?: AbortSignal): Promise<CleanupRunResult>;

  /**
   * Run every selected cleaner without any mutating call
   */
  executeDryRun(scope: CleanupScope, signal?: AbortSignal): Promise<CleanupRunResult>;

  /**
   * Run every selected cleaner, committing only when `commit` is set
   */
  execute(scope: CleanupScope, commit: boolean, signal?: AbortSignal): Promise<CleanupRunResult>;

  getOptions(): CleanupOptions;
}
