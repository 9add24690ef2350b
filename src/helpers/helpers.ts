import type { z } from 'zod';
import { ApiError, getErrorMessage, type UpstreamPlatform } from '../errors/index.js';
import { RETRY } from '../config/api.js';
import { createLogger } from './logger.js';

const log = createLogger('Retry');

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof ApiError) return error.statusCode;
  return undefined;
}

/**
 * Retry wrapper for requests (handles rate limiting).
 * Only HTTP 429 is retried; other failures propagate immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = RETRY.MAX_RETRIES,
  baseDelayMs: number = RETRY.BASE_DELAY_MS
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (statusOf(error) !== 429 || attempt >= maxRetries - 1) throw error;

      const waitMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(`Rate limited, waiting ${waitMs}ms (attempt ${attempt + 1}/${maxRetries})`);
      await sleep(waitMs);
    }
  }
}

export interface FetchJsonOptions {
  platform: UpstreamPlatform;
  timeoutMs: number;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * Fetch a JSON document, mapping transport failures and non-2xx
 * responses to ApiError. The body is returned unvalidated.
 */
export async function fetchJson(url: string | URL, options: FetchJsonOptions): Promise<unknown> {
  const { platform, timeoutMs, method = 'GET', headers = {}, body } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: {
        Accept: 'application/json',
        ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...headers,
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new ApiError(`${platform} request failed: ${getErrorMessage(error)}`, platform);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw new ApiError(
      `${platform} API error: ${response.status} ${response.statusText}${detail ? ` - ${detail.slice(0, 200)}` : ''}`,
      platform,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ApiError(`${platform} returned invalid JSON: ${getErrorMessage(error)}`, platform, response.status);
  }
}

/**
 * Validate an upstream response body.
 *
 * @throws ApiError when the payload does not have the expected shape
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  platform: UpstreamPlatform,
  what: string
): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ApiError(`Unexpected ${platform} ${what} response${where}: ${issue?.message ?? 'invalid body'}`, platform);
  }
  return parsed.data;
}
