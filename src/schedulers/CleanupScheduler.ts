import * as cron from 'node-cron';
import { CleanupRunResult, CleanupScope, ScheduleConfig } from '../types';
import { ICleanupOrchestrator, ICleanupScheduler, ILogger, INotificationService, NotificationMessage } from '../interfaces';
import { CancelledError, errorMessage } from '../errors';

/**
 * Re-runs the collector on a cron schedule.
 *
 * The two-pass protocol only deletes on a run after the one that marked, so
 * a deployment needs repeated runs to make progress. Ticks never overlap.
 */
export class CleanupScheduler implements ICleanupScheduler {
  private orchestrator: ICleanupOrchestrator;
  private scope: CleanupScope;
  private scheduleConfig: ScheduleConfig;
  private logger: ILogger;
  private notificationService?: INotificationService;
  private scheduledTasks: Map<string, cron.ScheduledTask> = new Map();
  private activeRun?: AbortController;

  constructor(
    orchestrator: ICleanupOrchestrator,
    scope: CleanupScope,
    scheduleConfig: ScheduleConfig,
    logger: ILogger,
    notificationService?: INotificationService
  ) {
    this.orchestrator = orchestrator;
    this.scope = scope;
    this.scheduleConfig = scheduleConfig;
    this.logger = logger;
    this.notificationService = notificationService;
  }

  /**
   * Start scheduled cleanup operations
   */
  async startSchedule(): Promise<void> {
    if (!this.scheduleConfig.enabled) {
      this.logger.log('Scheduler is disabled');
      return;
    }

    if (!cron.validate(this.scheduleConfig.cronExpression)) {
      throw new Error(`Invalid cron expression: ${this.scheduleConfig.cronExpression}`);
    }

    this.logger.log(
      `Starting cleanup scheduler (${this.scheduleConfig.cronExpression}, ${this.scheduleConfig.commit ? 'commit' : 'dry-run'})`
    );

    const task = cron.schedule(
      this.scheduleConfig.cronExpression,
      () => this.onTick(),
      {
        scheduled: false,
        timezone: this.scheduleConfig.timezone || 'UTC'
      }
    );

    this.scheduledTasks.set('main', task);
    task.start();

    await this.notify({
      type: 'info',
      title: 'Cleanup Scheduler Started',
      message: `Scheduled cleanup will run: ${this.scheduleConfig.cronExpression}`,
      timestamp: new Date()
    });
  }

  /**
   * Stop scheduled cleanup operations
   */
  async stopSchedule(): Promise<void> {
    this.logger.log('Stopping cleanup scheduler');

    for (const [name, task] of this.scheduledTasks) {
      task.stop();
      this.logger.debug(`Stopped scheduled task: ${name}`);
    }
    this.scheduledTasks.clear();

    this.activeRun?.abort();
  }

  getStatus(): { running: boolean; busy: boolean; tasksCount: number } {
    return {
      running: this.scheduledTasks.has('main'),
      busy: this.activeRun !== undefined,
      tasksCount: this.scheduledTasks.size
    };
  }

  /**
   * Execute one scheduled cleanup now; notifies and rethrows on failure
   */
  async executeScheduledCleanup(): Promise<CleanupRunResult> {
    const controller = new AbortController();
    this.activeRun = controller;

    try {
      const result = await this.orchestrator.execute(this.scope, this.scheduleConfig.commit, controller.signal);

      const failed = result.outcomes.filter(outcome => !outcome.success);
      await this.notify({
        type: failed.length > 0 ? 'warning' : 'success',
        title: 'Scheduled Cleanup Completed',
        message: this.formatResultMessage(result),
        timestamp: new Date(),
        data: {
          mode: result.mode,
          region: result.region,
          executionTime: result.executionTime,
          failedKinds: failed.map(outcome => outcome.kind)
        }
      });

      return result;
    } catch (error) {
      await this.notify({
        type: 'error',
        title: 'Scheduled Cleanup Failed',
        message: `Cleanup failed: ${errorMessage(error)}`,
        timestamp: new Date()
      });
      throw error;
    } finally {
      this.activeRun = undefined;
    }
  }

  /**
   * Cron callback; never rejects
   */
  private async onTick(): Promise<void> {
    if (this.activeRun) {
      this.logger.warning('Previous scheduled cleanup still running, skipping this tick');
      return;
    }

    try {
      await this.executeScheduledCleanup();
    } catch (error) {
      if (error instanceof CancelledError) {
        this.logger.warning('Scheduled cleanup cancelled');
      } else {
        this.logger.error(`Scheduled cleanup failed: ${errorMessage(error)}`);
      }
    }
  }

  private async notify(message: NotificationMessage): Promise<void> {
    if (this.notificationService) {
      await this.notificationService.sendNotification(message);
    }
  }

  private formatResultMessage(result: CleanupRunResult): string {
    const deleted = result.outcomes.reduce((sum, outcome) => sum + (outcome.stats?.deleted ?? 0), 0);
    const marked = result.outcomes.reduce((sum, outcome) => sum + (outcome.stats?.marked ?? 0), 0);
    const failed = result.outcomes.filter(outcome => !outcome.success).map(outcome => outcome.kind);

    const mode = result.mode === 'dry-run' ? 'Dry-run' : 'Cleanup';
    const failure = failed.length > 0 ? `, failed kinds: ${failed.join(', ')}` : '';
    return `${mode} in ${result.region} completed: ${marked} marked, ${deleted} deleted${failure}`;
  }
}
