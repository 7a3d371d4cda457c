/**
 * Notification message interface
 */
export interface NotificationMessage {
  type: 'success' | 'error' | 'warning' | 'info';
  title: string;
  message: string;
  timestamp: Date;
  data?: Record<string, unknown>;
}

/**
 * Interface for notification services
 */
export interface INotificationService {
  /**
   * Send a notification; failures are logged, never thrown
   */
  sendNotification(message: NotificationMessage): Promise<void>;
}
