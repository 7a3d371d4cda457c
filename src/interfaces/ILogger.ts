/**
 * Leveled logging sink used by every cleaner
 */
export interface ILogger {
  /**
   * Informational outcome (a resource was marked or deleted, nothing to delete)
   */
  log(message: string): void;

  /**
   * Skip and classification detail
   */
  debug(message: string): void;

  /**
   * Recoverable operational issue
   */
  warning(message: string): void;

  /**
   * Per-resource failure
   */
  error(message: string): void;
}
