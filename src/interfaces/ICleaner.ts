import { CleanerStats, CleanupScope, ResourceKind, WaitOptions } from '../types';
import { ILogger } from './ILogger';

/**
 * Per-invocation state shared read-only with every cleaner
 */
export interface CleanupContext {
  readonly commit: boolean;
  readonly logger: ILogger;
  readonly signal?: AbortSignal;
  readonly loadBalancerWait: WaitOptions;
}

/**
 * One cleaner per resource kind
 */
export interface ICleaner {
  readonly kind: ResourceKind;

  /**
   * Mark or delete the stale resources of this kind.
   * Rejects only when the kind cannot be listed, or on cancellation.
   */
  clean(scope: CleanupScope, context: CleanupContext): Promise<CleanerStats>;
}
