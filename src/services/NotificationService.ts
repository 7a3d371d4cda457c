import { ILogger, INotificationService, NotificationMessage } from '../interfaces';
import { NotificationConfig } from '../types';
import { errorMessage } from '../errors';
import axios from 'axios';

/**
 * Webhook notifications for scheduled runs
 */
export class NotificationService implements INotificationService {
  private config: NotificationConfig;
  private logger: ILogger;

  constructor(config: NotificationConfig, logger: ILogger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Send a notification
   */
  async sendNotification(message: NotificationMessage): Promise<void> {
    if (!this.config.enabled) {
      this.logger.debug(`Notifications disabled, skipping "${message.title}"`);
      return;
    }

    if (!this.shouldSendNotification(message.type)) {
      this.logger.debug(`Notification type ${message.type} disabled, skipping "${message.title}"`);
      return;
    }

    if (!this.config.webhookUrl) {
      this.logger.debug(`No webhook configured, skipping "${message.title}"`);
      return;
    }

    try {
      await axios.post(this.config.webhookUrl, {
        type: message.type,
        title: message.title,
        message: message.message,
        timestamp: message.timestamp.toISOString(),
        data: message.data,
        source: 'aws-resource-gc'
      }, {
        timeout: 10000,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'aws-resource-gc/1.0.0'
        }
      });

      this.logger.debug(`Notification "${message.title}" sent`);
    } catch (error) {
      // Notification failures must not fail a cleanup run
      this.logger.error(`Failed to send notification "${message.title}": ${errorMessage(error)}`);
    }
  }

  private shouldSendNotification(type: NotificationMessage['type']): boolean {
    switch (type) {
    case 'success':
      return this.config.onSuccess;
    case 'error':
      return this.config.onFailure;
    case 'info':
      return this.config.onStart;
    case 'warning':
      return true;
    }
  }
}
