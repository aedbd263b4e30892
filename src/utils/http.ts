/**
 * Fetch with a timeout, mapping transport failures to ServiceError.
 */
import { ServiceError, ErrorCodes, errorMessage } from './errors.js';

export const USER_AGENT = 'springinit';

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Send a request and read its response with `read`, all under one
 * timeout. ServiceErrors thrown by `read` pass through unchanged.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestOptions,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...init,
      headers: { 'User-Agent': USER_AGENT, ...init.headers },
      signal: controller.signal,
    });
    return await read(response);
  } catch (error) {
    if (error instanceof ServiceError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new ServiceError(ErrorCodes.SERVICE_TIMEOUT, `Request to ${url} timed out after ${timeoutMs}ms`, {
        url,
        timeoutMs,
      });
    }
    throw new ServiceError(ErrorCodes.SERVICE_UNREACHABLE, `Request to ${url} failed: ${errorMessage(error)}`, {
      url,
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Throw a ServiceError for a non-2xx response.
 */
export async function ensureOk(response: Response, message: string): Promise<void> {
  if (response.ok) {
    return;
  }
  const body = await response.text().catch(() => '');
  const snippet = body.length > 200 ? body.substring(0, 200) + '...' : body;
  throw new ServiceError(ErrorCodes.SERVICE_STATUS, `${message}: ${response.status} ${response.statusText}`.trim(), {
    status: response.status,
    body: snippet,
  });
}
