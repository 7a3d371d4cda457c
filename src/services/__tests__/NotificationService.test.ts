import axios from 'axios';
import { NotificationService } from '../NotificationService';
import { NotificationMessage } from '../../interfaces';
import { NotificationConfig } from '../../types';
import { RecordingLogger } from '../../__tests__/helpers/fakes';

// Mock axios
jest.mock('axios');
const mockAxios = jest.mocked(axios);

describe('NotificationService', () => {
  let config: NotificationConfig;
  let logger: RecordingLogger;
  let message: NotificationMessage;

  beforeEach(() => {
    jest.clearAllMocks();

    config = {
      enabled: true,
      onSuccess: true,
      onFailure: true,
      onStart: true,
      webhookUrl: 'https://hooks.example.test/gc'
    };
    logger = new RecordingLogger();
    message = {
      type: 'success',
      title: 'Scheduled Cleanup Completed',
      message: 'Cleanup in us-east-1 completed: 1 marked, 2 deleted',
      timestamp: new Date('2026-01-02T03:04:05.000Z'),
      data: { region: 'us-east-1' }
    };
  });

  describe('Notification Sending', () => {
    it('should post the message to the webhook', async () => {
      mockAxios.post.mockResolvedValue({ status: 200 });

      await new NotificationService(config, logger).sendNotification(message);

      expect(mockAxios.post).toHaveBeenCalledWith(
        'https://hooks.example.test/gc',
        {
          type: 'success',
          title: 'Scheduled Cleanup Completed',
          message: 'Cleanup in us-east-1 completed: 1 marked, 2 deleted',
          timestamp: '2026-01-02T03:04:05.000Z',
          data: { region: 'us-east-1' },
          source: 'aws-resource-gc'
        },
        {
          timeout: 10000,
          headers: {
            'Content-Type': 'application/json',
            'User-Agent': 'aws-resource-gc/1.0.0'
          }
        }
      );
      expect(logger.messages('debug')).toEqual(['Notification "Scheduled Cleanup Completed" sent']);
    });

    it('should log a failed post without throwing', async () => {
      mockAxios.post.mockRejectedValue(new Error('Network Error'));

      await expect(new NotificationService(config, logger).sendNotification(message)).resolves.toBeUndefined();

      expect(logger.messages('error')).toEqual([
        'Failed to send notification "Scheduled Cleanup Completed": Network Error'
      ]);
    });
  });

  describe('Notification Filtering', () => {
    it('should send nothing when disabled', async () => {
      await new NotificationService({ ...config, enabled: false }, logger).sendNotification(message);

      expect(mockAxios.post).not.toHaveBeenCalled();
      expect(logger.messages('debug')).toEqual(['Notifications disabled, skipping "Scheduled Cleanup Completed"']);
    });

    it('should respect the per-type switches', async () => {
      const service = new NotificationService({ ...config, onSuccess: false, onFailure: false, onStart: false }, logger);

      await service.sendNotification(message);
      await service.sendNotification({ ...message, type: 'error' });
      await service.sendNotification({ ...message, type: 'info' });

      expect(mockAxios.post).not.toHaveBeenCalled();
    });

    it('should always send warnings', async () => {
      mockAxios.post.mockResolvedValue({ status: 200 });
      const service = new NotificationService({ ...config, onSuccess: false, onFailure: false, onStart: false }, logger);

      await service.sendNotification({ ...message, type: 'warning' });

      expect(mockAxios.post).toHaveBeenCalledTimes(1);
    });

    it('should skip when no webhook is configured', async () => {
      await new NotificationService({ ...config, webhookUrl: undefined }, logger).sendNotification(message);

      expect(mockAxios.post).not.toHaveBeenCalled();
      expect(logger.messages('debug')).toEqual(['No webhook configured, skipping "Scheduled Cleanup Completed"']);
    });
  });
});
