import {
  CleanupOptions,
  CleanupRunResult,
  CleanupScope,
  KindOutcome,
  RESOURCE_KINDS,
  RunMode
} from '../types';
import {
  CleanupContext,
  ICleaner,
  ICleanupOrchestrator,
  IReporter
} from '../interfaces';
import { CancelledError, errorMessage, rethrowIfCancelled, throwIfCancelled } from '../errors';

/**
 * Main orchestrator that runs every cleaner for one scope.
 *
 * Cleaners run one after the other in dependency order (load balancers and
 * network interfaces before VPCs). A kind that cannot be listed is reported
 * and the run moves on; only cancellation stops the run.
 */
export class CleanupOrchestrator implements ICleanupOrchestrator {
  private cleaners: ICleaner[];
  private reporter: IReporter;
  private options: CleanupOptions;

  constructor(cleaners: ICleaner[], reporter: IReporter, options: CleanupOptions) {
    this.cleaners = cleaners;
    this.reporter = reporter;
    this.options = options;
  }

  /**
   * Execute the cleanup in the configured mode
   */
  async executeCleanup(scope: CleanupScope, signal?: AbortSignal): Promise<CleanupRunResult> {
    return this.execute(scope, this.options.commit, signal);
  }

  /**
   * Execute a dry run regardless of the configured mode
   */
  async executeDryRun(scope: CleanupScope, signal?: AbortSignal): Promise<CleanupRunResult> {
    return this.execute(scope, false, signal);
  }

  getOptions(): CleanupOptions {
    return { ...this.options, resourceTypes: [...this.options.resourceTypes] };
  }

  /**
   * Execute in an explicit mode; the configured commit flag is not consulted
   */
  async execute(scope: CleanupScope, commit: boolean, signal?: AbortSignal): Promise<CleanupRunResult> {
    const startedAt = new Date();
    const startTime = Date.now();
    const mode: RunMode = commit ? 'commit' : 'dry-run';

    const context: CleanupContext = Object.freeze({
      commit,
      logger: this.reporter,
      signal,
      loadBalancerWait: { ...this.options.loadBalancerWait }
    });

    this.reporter.logRunStart(mode, scope);

    const outcomes: KindOutcome[] = [];
    try {
      for (const cleaner of this.selectCleaners()) {
        throwIfCancelled(signal);
        outcomes.push(await this.runCleaner(cleaner, scope, context));
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        this.reporter.warning(`cleanup run cancelled after ${outcomes.length} resource kind(s)`);
      }
      throw error;
    }

    const result: CleanupRunResult = {
      mode,
      region: scope.session.region,
      startedAt,
      executionTime: Date.now() - startTime,
      outcomes
    };

    this.reporter.logRunComplete(result);

    return result;
  }

  private async runCleaner(cleaner: ICleaner, scope: CleanupScope, context: CleanupContext): Promise<KindOutcome> {
    try {
      const stats = await cleaner.clean(scope, context);
      return { kind: cleaner.kind, success: true, stats };
    } catch (error) {
      rethrowIfCancelled(error, context.signal);
      const message = errorMessage(error);
      this.reporter.error(`failed to clean ${cleaner.kind}: ${message}`);
      return { kind: cleaner.kind, success: false, error: message };
    }
  }

  /**
   * Cleaners of the selected kinds (all when none selected), in dependency order
   */
  private selectCleaners(): ICleaner[] {
    const { resourceTypes } = this.options;

    return this.cleaners
      .filter(cleaner => resourceTypes.length === 0 || resourceTypes.includes(cleaner.kind))
      .sort((a, b) => RESOURCE_KINDS.indexOf(a.kind) - RESOURCE_KINDS.indexOf(b.kind));
  }
}
