import { CleanupRunResult } from '../types';

/**
 * Interface for cleanup scheduler
 */
export interface ICleanupScheduler {
  /**
   * Start scheduled cleanup operations
   */
  startSchedule(): Promise<void>;

  /**
   * Stop scheduled cleanup operations, cancelling a run in progress
   */
  stopSchedule(): Promise<void>;

  getStatus(): { running: boolean; busy: boolean; tasksCount: number };

  /**
   * Execute one scheduled cleanup now
   */
  executeScheduledCleanup(): Promise<CleanupRunResult>;
}
