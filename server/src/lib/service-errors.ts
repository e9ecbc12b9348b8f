import { ResumeError, errorMessage, isResumeError } from './errors.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const CONNECTIVITY_PATTERNS = [
  'connection',
  'network',
  'fetch failed',
  'socket hang up',
  'getaddrinfo',
];

function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code.toUpperCase() : null;
}

/**
 * Best-effort guess at whether a failed service call never reached the
 * service. Checks the errno-style code on the error and on its `cause`
 * (undici wraps socket errors as `TypeError: fetch failed`), then falls back
 * to keywords in the message.
 */
export function isConnectivityError(error: unknown): boolean {
  const cause = error instanceof Error ? error.cause : undefined;
  const code = getErrorCode(error) ?? getErrorCode(cause);
  if (code && NETWORK_ERROR_CODES.has(code)) return true;

  const msg = errorMessage(error).toLowerCase();
  return CONNECTIVITY_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Wrap a failure from the generation service as a `connectivity` or
 * `service` ResumeError. ResumeErrors pass through unchanged.
 */
export function toServiceError(error: unknown): ResumeError {
  if (isResumeError(error)) return error;
  const details = errorMessage(error);
  if (isConnectivityError(error)) {
    return new ResumeError(
      `Connection error: Check your internet connection and API key. Details: ${details}`,
      'connectivity',
      { cause: error },
    );
  }
  return new ResumeError(`API error: ${details}`, 'service', { cause: error });
}
