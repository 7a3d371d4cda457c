import { CleanerStats, CleanupRunResult, CleanupScope, KindOutcome, ReportingOptions, RunMode } from '../types';
import { IReporter } from '../interfaces';
import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';

/**
 * Leveled logging sink and run summaries
 */
export class Reporter implements IReporter {
  private logger: winston.Logger;
  private logPath: string;
  private verbose: boolean;

  constructor(options: ReportingOptions = { verbose: false, logPath: './logs' }) {
    this.logPath = options.logPath;
    this.verbose = options.verbose;
    this.logger = this.setupLogger();
  }

  log(message: string): void {
    this.logger.info(message);
  }

  debug(message: string): void {
    this.logger.debug(message);
  }

  warning(message: string): void {
    this.logger.warn(message);
  }

  error(message: string): void {
    this.logger.error(message);
  }

  /**
   * Log cleanup run start
   */
  logRunStart(mode: RunMode, scope: CleanupScope): void {
    this.logger.info(`Starting ${mode} cleanup`, {
      mode,
      region: scope.session.region,
      profile: scope.session.profile,
      ignoreTag: scope.ignoreTag,
      timestamp: new Date().toISOString()
    });
  }

  /**
   * Log cleanup run completion
   */
  logRunComplete(result: CleanupRunResult): void {
    this.logger.info(`${result.mode} cleanup completed`, {
      mode: result.mode,
      region: result.region,
      executionTime: result.executionTime,
      kindsCleaned: result.outcomes.filter(outcome => outcome.success).length,
      kindsFailed: result.outcomes.filter(outcome => !outcome.success).length,
      timestamp: new Date().toISOString()
    });
  }

  /**
   * Generate summary text
   */
  generateSummary(result: CleanupRunResult): string {
    const lines: string[] = [];

    lines.push(`=== AWS Resource GC Report (${result.mode.toUpperCase()}) ===`);
    lines.push(`Region: ${result.region}`);
    lines.push(`Started: ${result.startedAt.toISOString()}`);
    lines.push(`Execution Time: ${(result.executionTime / 1000).toFixed(2)}s`);
    lines.push('');

    if (result.outcomes.length > 0) {
      lines.push('RESOURCE KINDS:');
      result.outcomes.forEach(outcome => {
        lines.push(`  ${this.describeOutcome(outcome)}`);
      });
      lines.push('');
    }

    const failed = result.outcomes.filter(outcome => !outcome.success).length;
    lines.push(`Kinds Failed: ${failed}/${result.outcomes.length}`);

    return lines.join('\n');
  }

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger {
    return this.logger;
  }

  private describeOutcome(outcome: KindOutcome): string {
    if (!outcome.success || !outcome.stats) {
      return `${outcome.kind}: FAILED (${outcome.error ?? 'unknown error'})`;
    }

    const stats: CleanerStats = outcome.stats;
    const failures = stats.markFailures + stats.contextFailures + stats.deleteFailures;
    return `${outcome.kind}: scanned ${stats.scanned}, ignored ${stats.ignored}, excluded ${stats.excluded}, ` +
      `marked ${stats.marked}, pending deletion ${stats.pendingDeletion}, deleted ${stats.deleted}, failures ${failures}`;
  }

  /**
   * Setup Winston logger with file and console transports
   */
  private setupLogger(): winston.Logger {
    this.ensureLogDirectorySync();

    const level = this.verbose ? 'debug' : 'info';

    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const consoleFormat = winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    );

    return winston.createLogger({
      level,
      format: logFormat,
      transports: [
        new winston.transports.File({
          filename: path.join(this.logPath, 'gc.log'),
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.File({
          filename: path.join(this.logPath, 'gc-error.log'),
          level: 'error',
          maxsize: 10 * 1024 * 1024,
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.Console({
          format: consoleFormat,
          level: process.env.NODE_ENV === 'test' ? 'error' : level
        })
      ]
    });
  }

  private ensureLogDirectorySync(): void {
    try {
      fs.accessSync(this.logPath);
    } catch {
      fs.mkdirSync(this.logPath, { recursive: true });
    }
  }
}
