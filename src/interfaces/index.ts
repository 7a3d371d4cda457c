export * from './ILogger';
export * from './IReporter';
export * from './IEc2Client';
export * from './ILoadBalancerClient';
export * from './IClientFactory';
export * from './ICleaner';
export * from './ICleanupOrchestrator';
export { ICleanupScheduler } from './ICleanupScheduler';
export { INotificationService, NotificationMessage } from './INotificationService';
