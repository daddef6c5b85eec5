import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { StockImageError } from './errors.js';
import { logger } from './logger.js';
import { PROVIDER_LABELS, type EImageProvider } from './types.js';
import { delay, sanitizeError } from './utils.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  networkRetries: number;
  retryDelayMs: number;
  fetch?: FetchLike;
}

export interface GetJsonOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Outcome of one attempt. A response counts only once its body has been read.
 */
type Attempt =
  | { ok: true; status: number; statusOk: boolean; body: string }
  | { ok: false; reason: 'timeout' | 'aborted' | 'network'; error?: unknown };

const ABORTED = Symbol('aborted');

// Settles on abort even when the fetch or body stream ignores the signal
function whenAborted(signal: AbortSignal): Promise<typeof ABORTED> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(ABORTED);
      return;
    }
    signal.addEventListener('abort', () => resolve(ABORTED), { once: true });
  });
}

/**
 * JSON GET with per-call timeout, a bounded retry for network failures,
 * and mapping of every failure to a StockImageError.
 */
export class HttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getJson(provider: EImageProvider, url: string, options: GetJsonOptions = {}): Promise<unknown> {
    const label = PROVIDER_LABELS[provider];
    const maxAttempts = this.options.networkRetries + 1;

    let attempt: Attempt = { ok: false, reason: 'network' };
    for (let i = 0; i < maxAttempts; i++) {
      if (i > 0) {
        const wait = this.options.retryDelayMs * 2 ** (i - 1);
        logger.debug(`[${label}] network error, retrying in ${wait}ms (attempt ${i + 1}/${maxAttempts})`);
        await delay(wait);
      }

      attempt = await this.attempt(url, options);
      // Only failures without an HTTP response are worth repeating
      if (attempt.ok || attempt.reason !== 'network') break;
    }

    if (!attempt.ok) {
      if (attempt.reason === 'timeout') {
        throw new StockImageError(
          'ProviderTimeout',
          `${label} did not respond within ${this.options.timeoutMs}ms`,
          { provider }
        );
      }
      if (attempt.reason === 'aborted') {
        throw new StockImageError('ProviderTimeout', `${label} request aborted`, { provider });
      }
      const detail = attempt.error instanceof Error ? attempt.error.message : String(attempt.error);
      throw new StockImageError(
        'ProviderHttpError',
        `${label} request failed: ${sanitizeError(detail)}`,
        { provider, cause: attempt.error }
      );
    }

    if (!attempt.statusOk) {
      const sanitized = sanitizeError(attempt.body);
      throw new StockImageError(
        'ProviderHttpError',
        `${label} API error (${attempt.status})${sanitized ? `: ${sanitized}` : ''}`,
        { provider, status: attempt.status }
      );
    }

    try {
      const data: unknown = JSON.parse(attempt.body);
      return data;
    } catch (error) {
      throw new StockImageError('MalformedResponse', `${label} returned invalid JSON`, {
        provider,
        cause: error,
      });
    }
  }

  private async attempt(url: string, options: GetJsonOptions): Promise<Attempt> {
    const { signal } = options;
    if (signal?.aborted) {
      return { ok: false, reason: 'aborted' };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const aborted = whenAborted(controller.signal);
    try {
      const response = await Promise.race([
        this.fetchImpl(url, { headers: options.headers, signal: controller.signal }),
        aborted,
      ]);
      if (response === ABORTED) {
        return { ok: false, reason: timedOut ? 'timeout' : 'aborted' };
      }

      // The timer and the caller's signal still apply while the body streams in
      const body = await Promise.race([
        response.ok ? response.text() : response.text().catch(() => ''),
        aborted,
      ]);
      if (body === ABORTED) {
        return { ok: false, reason: timedOut ? 'timeout' : 'aborted' };
      }
      return { ok: true, status: response.status, statusOk: response.ok, body };
    } catch (error) {
      if (timedOut) return { ok: false, reason: 'timeout' };
      if (signal?.aborted) return { ok: false, reason: 'aborted' };
      return { ok: false, reason: 'network', error };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
