import axios from 'axios';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import { retry } from '../utils/retry';

const TELEGRAM_API = 'https://api.telegram.org';
const SEND_TIMEOUT_MS = 10_000;

export interface TelegramCredentials {
  token: string;
  chatId: string;
}

/**
 * Posts one message to the operator chat. Returns false when credentials are
 * missing or every attempt failed; delivery errors never propagate.
 */
export async function sendTelegramMessage(credentials: TelegramCredentials, text: string): Promise<boolean> {
  const { token, chatId } = credentials;
  if (!token || !chatId) return false;
  const endpoint = `${TELEGRAM_API}/bot${token}/sendMessage`;
  try {
    await retry(() => axios.post(endpoint, { chat_id: chatId, text }, { timeout: SEND_TIMEOUT_MS }), {
      attempts: 3,
      delayMs: 500,
      backoffFactor: 2,
      onRetry: (error, attempt) =>
        logger.warn('telegram_send_retry', { event: 'telegram_send_retry', attempt, chatId, error: errorMessage(error) }),
    });
    return true;
  } catch (error) {
    logger.warn('telegram_send_failed', { event: 'telegram_send_failed', chatId, error: errorMessage(error) });
    return false;
  }
}
