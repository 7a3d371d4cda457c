#!/usr/bin/env node

import { Command } from 'commander';
import { CleanupOrchestrator } from '../orchestrators/CleanupOrchestrator';
import { Reporter } from '../reporters/Reporter';
import { AwsClientFactory } from '../clients/AwsClientFactory';
import { LoadBalancerCleaner, NetworkInterfaceCleaner, VpcCleaner } from '../cleaners';
import { CleanupScheduler } from '../schedulers/CleanupScheduler';
import { NotificationService } from '../services/NotificationService';
import {
  createDefaultConfig,
  loadConfigFile,
  parseResourceTypes,
  validateConfig as checkConfig
} from '../config/ConfigLoader';
import { CancelledError, errorMessage } from '../errors';
import { CleanupRunResult, CleanupScope, GcConfig } from '../types';

export interface CliOptions {
  commit?: boolean;
  types?: string;
  ignoreTag?: string;
  region?: string;
  profile?: string;
  endpoint?: string;
  config?: string;
  verbose?: boolean;
  logPath?: string;
  cron?: string;
  timezone?: string;
}

interface Runtime {
  orchestrator: CleanupOrchestrator;
  reporter: Reporter;
  factory: AwsClientFactory;
}

/**
 * CLI interface for the AWS resource garbage collector
 */
class AwsGcCLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('aws-gc')
      .description('Two-pass garbage collector for stale AWS network interfaces, VPCs and load balancers')
      .version('1.0.0');

    const withScopeOptions = (command: Command): Command => command
      .option('-t, --types <types>', 'Comma-separated list of resource types to clean (load-balancer,network-interface,vpc)', 'all')
      .option('--ignore-tag <key>', 'Tag key that protects a resource from cleanup')
      .option('--region <region>', 'AWS region')
      .option('--profile <profile>', 'Named AWS credentials profile')
      .option('--endpoint <url>', 'Override the AWS API endpoint')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Custom log directory path');

    // Main cleanup command
    withScopeOptions(
      this.program
        .command('cleanup')
        .description('Mark stale resources and delete the ones marked by a previous run')
        .option('--commit', 'Actually tag and delete resources (dry-run otherwise)')
    ).action(async (options: CliOptions) => {
      try {
        await this.executeCleanup(options);
      } catch (error) {
        console.error('❌ Cleanup failed:', errorMessage(error));
        process.exit(1);
      }
    });

    // Dry-run command (shortcut)
    withScopeOptions(
      this.program
        .command('dry-run')
        .description('Report what a committed run would tag or delete, without changing anything')
    ).action(async (options: CliOptions) => {
      try {
        await this.executeDryRun(options);
      } catch (error) {
        console.error('❌ Dry-run failed:', errorMessage(error));
        process.exit(1);
      }
    });

    // Scheduler command
    withScopeOptions(
      this.program
        .command('schedule')
        .description('Run the collector periodically on a cron schedule')
        .option('--commit', 'Scheduled runs tag and delete resources')
        .option('--cron <expression>', 'Cron expression for scheduled runs')
        .option('--timezone <tz>', 'Timezone for the cron expression')
    ).action(async (options: CliOptions) => {
      try {
        await this.startScheduler(options);
      } catch (error) {
        console.error('❌ Scheduler failed:', errorMessage(error));
        process.exit(1);
      }
    });

    // Config validation command
    this.program
      .command('validate-config')
      .description('Validate configuration file')
      .option('-c, --config <path>', 'Path to configuration file (see config.example.json)', './config.json')
      .action(async (options: CliOptions) => {
        try {
          await this.validateConfig(options);
        } catch (error) {
          console.error('❌ Config validation failed:', errorMessage(error));
          process.exit(1);
        }
      });
  }

  /**
   * Execute a cleanup run in the configured mode
   */
  async executeCleanup(options: CliOptions): Promise<void> {
    const config = this.loadConfig(options);
    console.log(`🚀 Starting ${config.cleanup.commit ? 'committed' : 'dry-run'} cleanup in ${config.aws.region}...\n`);

    const { orchestrator, reporter, factory } = this.createRuntime(config);
    let result: CleanupRunResult;
    try {
      result = await this.withCancellation(signal =>
        orchestrator.executeCleanup(this.createScope(config), signal)
      );
    } finally {
      factory.destroy();
    }

    this.displayReport(reporter, result);

    if (result.outcomes.some(outcome => !outcome.success)) {
      process.exit(1);
    }
  }

  /**
   * Execute a dry run
   */
  async executeDryRun(options: CliOptions): Promise<void> {
    const config = this.loadConfig(options);
    console.log(`🔍 Starting dry-run preview in ${config.aws.region}...\n`);

    const { orchestrator, reporter, factory } = this.createRuntime(config);
    let result: CleanupRunResult;
    try {
      result = await this.withCancellation(signal =>
        orchestrator.executeDryRun(this.createScope(config), signal)
      );
    } finally {
      factory.destroy();
    }

    this.displayReport(reporter, result);

    if (result.outcomes.some(outcome => !outcome.success)) {
      process.exit(1);
    }
  }

  /**
   * Start the cron scheduler; runs until SIGINT/SIGTERM
   */
  async startScheduler(options: CliOptions): Promise<CleanupScheduler> {
    const config = this.loadConfig(options);
    const scheduling = config.scheduling;
    if (!scheduling || !scheduling.enabled) {
      throw new Error('Scheduling is not enabled: set scheduling in the config file or pass --cron');
    }

    const { orchestrator, reporter, factory } = this.createRuntime(config);
    const notificationService = config.notifications
      ? new NotificationService(config.notifications, reporter)
      : undefined;

    const scheduler = new CleanupScheduler(
      orchestrator,
      this.createScope(config),
      scheduling,
      reporter,
      notificationService
    );

    await scheduler.startSchedule();
    console.log(`⏰ Scheduler started (${scheduling.cronExpression}, ${scheduling.commit ? 'commit' : 'dry-run'})`);

    const shutdown = (): void => {
      scheduler.stopSchedule().then(
        () => {
          factory.destroy();
          console.log('👋 Scheduler stopped');
        },
        (error: unknown) => console.error('❌ Failed to stop scheduler:', errorMessage(error))
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    return scheduler;
  }

  /**
   * Validate configuration file
   */
  async validateConfig(options: CliOptions): Promise<void> {
    console.log('✅ Validating configuration...\n');

    try {
      const config = this.loadConfig(options);

      console.log(`🌍 Region: ${config.aws.region}${config.aws.profile ? ` (profile ${config.aws.profile})` : ''}`);
      console.log(`🏷️ Ignore tag: ${config.cleanup.ignoreTag}`);
      console.log(`📦 Resource types: ${config.cleanup.resourceTypes.length > 0 ? config.cleanup.resourceTypes.join(', ') : 'all'}`);
      console.log(`⚙️ Mode: ${config.cleanup.commit ? 'commit' : 'dry-run'}`);

      console.log('\n🎉 Configuration is valid!');
    } catch (error) {
      throw new Error(`Configuration validation failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Load configuration from file or defaults, apply CLI options, validate
   */
  loadConfig(options: CliOptions): GcConfig {
    const config = options.config
      ? loadConfigFile(options.config)
      : createDefaultConfig();

    this.applyCliOptions(config, options);
    checkConfig(config);

    return config;
  }

  /**
   * Apply CLI options to configuration
   */
  private applyCliOptions(config: GcConfig, options: CliOptions): void {
    if (options.commit) {
      config.cleanup.commit = true;
    }

    if (options.types && options.types !== 'all') {
      config.cleanup.resourceTypes = parseResourceTypes(options.types);
    }

    if (options.ignoreTag !== undefined) {
      config.cleanup.ignoreTag = options.ignoreTag;
    }

    // AWS session
    if (options.region) {
      config.aws.region = options.region;
    }
    if (options.profile) {
      config.aws.profile = options.profile;
    }
    if (options.endpoint) {
      config.aws.endpoint = options.endpoint;
    }

    // Reporting settings
    if (options.verbose) {
      config.reporting.verbose = true;
    }
    if (options.logPath) {
      config.reporting.logPath = options.logPath;
    }

    // Scheduling
    if (options.cron) {
      config.scheduling = {
        enabled: true,
        cronExpression: options.cron,
        commit: options.commit ?? config.scheduling?.commit ?? false,
        timezone: options.timezone ?? config.scheduling?.timezone
      };
    } else if (config.scheduling && options.commit) {
      config.scheduling.commit = true;
    }
  }

  private createScope(config: GcConfig): CleanupScope {
    return {
      session: { ...config.aws },
      ignoreTag: config.cleanup.ignoreTag
    };
  }

  /**
   * Create orchestrator with all dependencies
   */
  private createRuntime(config: GcConfig): Runtime {
    const reporter = new Reporter(config.reporting);
    const factory = new AwsClientFactory();

    const cleaners = [
      new LoadBalancerCleaner(factory),
      new NetworkInterfaceCleaner(factory),
      new VpcCleaner(factory)
    ];

    return {
      orchestrator: new CleanupOrchestrator(cleaners, reporter, config.cleanup),
      reporter,
      factory
    };
  }

  /**
   * Run one invocation, aborting it on SIGINT/SIGTERM
   */
  private async withCancellation(run: (signal: AbortSignal) => Promise<CleanupRunResult>): Promise<CleanupRunResult> {
    const controller = new AbortController();
    const abort = (): void => {
      console.log('\n⏹️ Cancelling cleanup...');
      controller.abort();
    };

    process.once('SIGINT', abort);
    process.once('SIGTERM', abort);
    try {
      return await run(controller.signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw new Error('Cleanup was cancelled');
      }
      throw error;
    } finally {
      process.removeListener('SIGINT', abort);
      process.removeListener('SIGTERM', abort);
    }
  }

  /**
   * Display cleanup report
   */
  private displayReport(reporter: Reporter, result: CleanupRunResult): void {
    console.log('');
    console.log(reporter.generateSummary(result));
    console.log('');

    if (result.mode === 'dry-run') {
      console.log('💡 This was a dry-run. Nothing was tagged or deleted.');
      console.log('💡 Run `aws-gc cleanup --commit` to tag and delete resources.');
    } else if (result.outcomes.every(outcome => outcome.success)) {
      console.log('✅ Cleanup completed successfully!');
    }
  }

  /**
   * Run the CLI
   */
  public async run(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new AwsGcCLI();
  cli.run().catch(error => {
    console.error('❌ CLI Error:', errorMessage(error));
    process.exit(1);
  });
}

export { AwsGcCLI };
