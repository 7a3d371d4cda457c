import * as fs from 'fs';
import * as cron from 'node-cron';
import { ConfigError } from '../errors';
import {
  DEFAULT_IGNORE_TAG,
  GcConfig,
  NotificationConfig,
  RESOURCE_KINDS,
  ResourceKind,
  ScheduleConfig
} from '../types';

type JsonObject = Record<string, unknown>;

const RESOURCE_TYPE_ALIASES: Record<string, ResourceKind> = {
  'load-balancer': 'load-balancer',
  'load-balancers': 'load-balancer',
  'elbv2': 'load-balancer',
  'network-interface': 'network-interface',
  'network-interfaces': 'network-interface',
  'eni': 'network-interface',
  'enis': 'network-interface',
  'vpc': 'vpc',
  'vpcs': 'vpc'
};

/**
 * Default configuration; region falls back to AWS_REGION
 */
export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): GcConfig {
  return {
    aws: {
      region: env.AWS_REGION || 'us-east-1'
    },
    cleanup: {
      commit: false,
      ignoreTag: DEFAULT_IGNORE_TAG,
      resourceTypes: [],
      loadBalancerWait: {
        timeoutMs: 10 * 60 * 1000,
        intervalMs: 15 * 1000
      }
    },
    reporting: {
      verbose: false,
      logPath: './logs'
    }
  };
}

/**
 * Parse a comma-separated list of resource types; "all" selects every kind
 */
export function parseResourceTypes(typesString: string): ResourceKind[] {
  if (typesString.trim() === 'all') {
    return [];
  }

  const parsed: ResourceKind[] = [];
  for (const type of typesString.split(',').map(t => t.trim().toLowerCase()).filter(t => t.length > 0)) {
    const kind = RESOURCE_TYPE_ALIASES[type];
    if (!kind) {
      throw new ConfigError(`Invalid resource type: ${type}. Valid types: ${Object.keys(RESOURCE_TYPE_ALIASES).join(', ')}`);
    }
    if (!parsed.includes(kind)) {
      parsed.push(kind);
    }
  }
  return parsed;
}

/**
 * Load a JSON configuration file over the defaults
 */
export function loadConfigFile(configPath: string, defaults: GcConfig = createDefaultConfig()): GcConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }

  return mergeConfig(defaults, parsed);
}

/**
 * Overlay a parsed JSON object on a configuration, checking every field it sets
 */
export function mergeConfig(base: GcConfig, source: JsonObject): GcConfig {
  const config: GcConfig = {
    aws: { ...base.aws },
    cleanup: {
      ...base.cleanup,
      resourceTypes: [...base.cleanup.resourceTypes],
      loadBalancerWait: { ...base.cleanup.loadBalancerWait }
    },
    reporting: { ...base.reporting },
    scheduling: base.scheduling ? { ...base.scheduling } : undefined,
    notifications: base.notifications ? { ...base.notifications } : undefined
  };

  const aws = section(source, 'aws');
  if (aws) {
    config.aws.region = readString(aws, 'aws.region') ?? config.aws.region;
    config.aws.profile = readString(aws, 'aws.profile') ?? config.aws.profile;
    config.aws.endpoint = readString(aws, 'aws.endpoint') ?? config.aws.endpoint;
  }

  const cleanup = section(source, 'cleanup');
  if (cleanup) {
    config.cleanup.commit = readBoolean(cleanup, 'cleanup.commit') ?? config.cleanup.commit;
    config.cleanup.ignoreTag = readString(cleanup, 'cleanup.ignoreTag') ?? config.cleanup.ignoreTag;

    const types = cleanup.resourceTypes;
    if (types !== undefined) {
      if (!Array.isArray(types) || !types.every((t): t is string => typeof t === 'string')) {
        throw new ConfigError('cleanup.resourceTypes must be an array of strings');
      }
      config.cleanup.resourceTypes = parseResourceTypes(types.join(','));
    }

    const wait = section(cleanup, 'loadBalancerWait', 'cleanup.');
    if (wait) {
      config.cleanup.loadBalancerWait.timeoutMs =
        readNumber(wait, 'cleanup.loadBalancerWait.timeoutMs') ?? config.cleanup.loadBalancerWait.timeoutMs;
      config.cleanup.loadBalancerWait.intervalMs =
        readNumber(wait, 'cleanup.loadBalancerWait.intervalMs') ?? config.cleanup.loadBalancerWait.intervalMs;
    }
  }

  const reporting = section(source, 'reporting');
  if (reporting) {
    config.reporting.verbose = readBoolean(reporting, 'reporting.verbose') ?? config.reporting.verbose;
    config.reporting.logPath = readString(reporting, 'reporting.logPath') ?? config.reporting.logPath;
  }

  const scheduling = section(source, 'scheduling');
  if (scheduling) {
    const current: ScheduleConfig = config.scheduling ?? { enabled: false, cronExpression: '', commit: false };
    config.scheduling = {
      enabled: readBoolean(scheduling, 'scheduling.enabled') ?? current.enabled,
      cronExpression: readString(scheduling, 'scheduling.cronExpression') ?? current.cronExpression,
      commit: readBoolean(scheduling, 'scheduling.commit') ?? current.commit,
      timezone: readString(scheduling, 'scheduling.timezone') ?? current.timezone
    };
  }

  const notifications = section(source, 'notifications');
  if (notifications) {
    const current: NotificationConfig = config.notifications ?? {
      enabled: false,
      onSuccess: true,
      onFailure: true,
      onStart: false
    };
    config.notifications = {
      enabled: readBoolean(notifications, 'notifications.enabled') ?? current.enabled,
      onSuccess: readBoolean(notifications, 'notifications.onSuccess') ?? current.onSuccess,
      onFailure: readBoolean(notifications, 'notifications.onFailure') ?? current.onFailure,
      onStart: readBoolean(notifications, 'notifications.onStart') ?? current.onStart,
      webhookUrl: readString(notifications, 'notifications.webhookUrl') ?? current.webhookUrl
    };
  }

  return config;
}

/**
 * Validate a complete configuration
 */
export function validateConfig(config: GcConfig): void {
  if (!config.aws.region) {
    throw new ConfigError('aws.region must not be empty');
  }

  if (!config.cleanup.ignoreTag) {
    throw new ConfigError('cleanup.ignoreTag must not be empty');
  }

  const invalidTypes = config.cleanup.resourceTypes.filter(type => !RESOURCE_KINDS.includes(type));
  if (invalidTypes.length > 0) {
    throw new ConfigError(`Invalid resource types in config: ${invalidTypes.join(', ')}`);
  }

  const { timeoutMs, intervalMs } = config.cleanup.loadBalancerWait;
  if (!(timeoutMs > 0) || !(intervalMs > 0)) {
    throw new ConfigError('cleanup.loadBalancerWait timeoutMs and intervalMs must be positive');
  }

  if (config.scheduling?.enabled && !cron.validate(config.scheduling.cronExpression)) {
    throw new ConfigError(`Invalid cron expression: ${config.scheduling.cronExpression}`);
  }

  if (config.notifications?.enabled && !config.notifications.webhookUrl) {
    throw new ConfigError('notifications.webhookUrl is required when notifications are enabled');
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: JsonObject, key: string, prefix: string = ''): JsonObject | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigError(`${prefix}${key} must be an object`);
  }
  return value;
}

function fieldName(path: string): string {
  return path.substring(path.lastIndexOf('.') + 1);
}

function readString(source: JsonObject, path: string): string | undefined {
  const value = source[fieldName(path)];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path} must be a string`);
  }
  return value;
}

function readBoolean(source: JsonObject, path: string): boolean | undefined {
  const value = source[fieldName(path)];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path} must be a boolean`);
  }
  return value;
}

function readNumber(source: JsonObject, path: string): number | undefined {
  const value = source[fieldName(path)];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigError(`${path} must be a number`);
  }
  return value;
}
