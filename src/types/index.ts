/**
 * Core type definitions for the AWS resource garbage collector
 */

// Resource kinds, in the order they must be cleaned: dependents before networks
export type ResourceKind = 'load-balancer' | 'network-interface' | 'vpc';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['load-balancer', 'network-interface', 'vpc'];

/**
 * Tag key written on a resource the first time it is seen as deletable.
 * Its presence on a later run approves the deletion.
 */
export const DELETION_TAG = 'aws-gc:marked-for-deletion';

export const DEFAULT_IGNORE_TAG = 'aws-gc:ignore';

export type Tags = Record<string, string>;

export type TagClassification = 'ignored' | 'marked' | 'unmarked';

export type TagDecision = 'skip' | 'mark' | 'delete' | 'dry-run';

// Session and scope
export interface AwsSession {
  region: string;
  profile?: string;
  endpoint?: string;
}

export interface CleanupScope {
  readonly session: AwsSession;
  readonly ignoreTag: string;
}

// Provider resources
export interface NetworkInterfaceResource {
  id: string;
  subnetId?: string;
  description?: string;
  status?: string;
  tags: Tags;
}

export interface VpcResource {
  id: string;
  isDefault: boolean;
  tags: Tags;
}

export interface NatGatewayResource {
  id: string;
  state?: string;
}

export interface InternetGatewayResource {
  id: string;
}

export interface RouteTableResource {
  id: string;
  isMain: boolean;
}

export interface SubnetResource {
  id: string;
}

export interface LoadBalancerResource {
  arn: string;
  name: string;
}

export interface TargetGroupResource {
  arn: string;
  name?: string;
}

// Result types
export interface CleanerStats {
  scanned: number;
  excluded: number;
  ignored: number;
  marked: number;
  markFailures: number;
  contextFailures: number;
  pendingDeletion: number;
  deleted: number;
  deleteFailures: number;
}

export interface KindOutcome {
  kind: ResourceKind;
  success: boolean;
  stats?: CleanerStats;
  error?: string;
}

export type RunMode = 'dry-run' | 'commit';

export interface CleanupRunResult {
  mode: RunMode;
  region: string;
  startedAt: Date;
  executionTime: number;
  outcomes: KindOutcome[];
}

// Configuration types
export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
}

export interface CleanupOptions {
  commit: boolean;
  ignoreTag: string;
  resourceTypes: ResourceKind[];
  loadBalancerWait: WaitOptions;
}

export interface ReportingOptions {
  verbose: boolean;
  logPath: string;
}

export interface ScheduleConfig {
  enabled: boolean;
  cronExpression: string;
  commit: boolean;
  timezone?: string;
}

export interface NotificationConfig {
  enabled: boolean;
  onSuccess: boolean;
  onFailure: boolean;
  onStart: boolean;
  webhookUrl?: string;
}

export interface GcConfig {
  aws: AwsSession;
  cleanup: CleanupOptions;
  reporting: ReportingOptions;
  scheduling?: ScheduleConfig;
  notifications?: NotificationConfig;
}
