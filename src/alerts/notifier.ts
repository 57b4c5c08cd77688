import { logger } from '../utils/logger';
import { sendTelegramMessage } from './telegram';
import type { TelegramCredentials } from './telegram';

export interface Notifier {
  notifyCritical(message: string, meta?: Record<string, unknown>): Promise<void>;
}

export class NoopNotifier implements Notifier {
  async notifyCritical(): Promise<void> {
    return undefined;
  }
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly credentials: TelegramCredentials,
    private readonly prefix = ''
  ) {}

  async notifyCritical(message: string, meta?: Record<string, unknown>): Promise<void> {
    logger.info('critical_alert_dispatch', { event: 'critical_alert_dispatch', message, ...meta });
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    const delivered = await sendTelegramMessage(this.credentials, text);
    if (!delivered) {
      logger.error('critical_alert_undelivered', { event: 'critical_alert_undelivered', message });
    }
  }
}

export function createNotifier(credentials: TelegramCredentials, prefix = ''): Notifier {
  if (!credentials.token || !credentials.chatId) {
    return new NoopNotifier();
  }
  return new TelegramNotifier(credentials, prefix);
}
