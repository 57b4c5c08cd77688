import { NetworkError } from 'ccxt';

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Network-level failures (timeouts, dropped connections, exchange maintenance)
 * that are worth retrying. Exchange rejections such as insufficient margin are not.
 */
export function isTransientGatewayError(error: unknown) {
  if (error instanceof NetworkError) return true;
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    return code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'EAI_AGAIN';
  }
  return false;
}
