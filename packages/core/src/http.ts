import { setTimeout as sleep } from 'node:timers/promises';
import type { ReadableStream } from 'node:stream/web';
import { Agent, fetch, type Dispatcher } from 'undici';
import type { TransportConfig } from './config.js';
import {
  HttpStatusError,
  OgcError,
  PayloadTooLargeError,
  TimeoutError,
  TransportError,
  errorMessage
} from './errors.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('http');

export const CAPABILITIES_ACCEPT = 'application/xml,text/xml,*/*;q=0.9';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT']);
const READ_TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const CONNECTION_FAILURE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED'
]);

/** Anything that can turn a URL into response bytes. */
export interface ByteTransport {
  getBytes(url: string): Promise<Uint8Array>;
}

export interface HttpTransportOptions extends TransportConfig {
  /** Replaces the default timeout-configured agent, e.g. with a MockAgent in tests. */
  dispatcher?: Dispatcher;
}

function parseNumericHeader(value: string | null): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseRetryAfterHeader(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function errorCause(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'cause' in value ? value.cause : undefined;
}

/**
 * Map whatever undici threw into one of the transport error classes.
 * `fetch` wraps socket failures as `TypeError('fetch failed')` with the real
 * error in `cause`, so the cause chain is searched for a known code.
 */
export function classifyFetchFailure(
  error: unknown,
  url: string,
  timeouts: Pick<TransportConfig, 'connectTimeoutMs' | 'readTimeoutMs'>
): OgcError {
  if (error instanceof OgcError) return error;

  let current: unknown = error;
  let innermost: unknown = error;
  let connectionFailure = false;
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    const code = errorCode(current);
    if (code && CONNECT_TIMEOUT_CODES.has(code)) {
      return new TimeoutError(url, 'connect', timeouts.connectTimeoutMs);
    }
    if (code && READ_TIMEOUT_CODES.has(code)) {
      return new TimeoutError(url, 'read', timeouts.readTimeoutMs);
    }
    if (code && CONNECTION_FAILURE_CODES.has(code)) {
      connectionFailure = true;
    }
    innermost = current;
    current = errorCause(current);
  }

  return new TransportError(`Request to ${url} failed: ${errorMessage(innermost)}`, url, {
    cause: error,
    connectionFailure
  });
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof TransportError) return error.connectionFailure;
  if (error instanceof HttpStatusError) return RETRYABLE_STATUS.has(error.httpStatus);
  return false;
}

export interface RetryOptions {
  /** Retries after the first attempt. */
  retries: number;
  /** Seconds; the n-th retry waits `backoffFactor * 2^(n-1)` seconds. */
  backoffFactor: number;
  maxRetryAfterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, retry: number, delayMs: number) => void;
}

export function retryDelayMs(retry: number, error: unknown, options: RetryOptions): number {
  const backoff = options.backoffFactor * 1000 * 2 ** (retry - 1);
  if (error instanceof HttpStatusError && error.retryAfterMs !== undefined) {
    const ceiling = options.maxRetryAfterMs ?? 0;
    return Math.max(backoff, Math.min(error.retryAfterMs, ceiling));
  }
  return backoff;
}

export async function getWithRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === options.retries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = retryDelayMs(attempt + 1, error, options);
      options.onRetry?.(error, attempt + 1, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  throw lastError;
}

async function discardBody(body: ReadableStream<Uint8Array> | null, url: string): Promise<void> {
  if (!body) return;
  try {
    await body.cancel();
  } catch (error) {
    log.debug({ url, err: errorMessage(error) }, 'failed to discard response body');
  }
}

export class HttpTransport implements ByteTransport {
  private readonly dispatcher: Dispatcher;

  constructor(private readonly options: HttpTransportOptions) {
    this.dispatcher = options.dispatcher ?? new Agent({
      connect: { timeout: options.connectTimeoutMs },
      headersTimeout: options.readTimeoutMs,
      bodyTimeout: options.readTimeoutMs
    });
  }

  async getBytes(url: string): Promise<Uint8Array> {
    return getWithRetry(() => this.fetchOnce(url), {
      retries: this.options.retryCount,
      backoffFactor: this.options.retryBackoffFactor,
      maxRetryAfterMs: this.options.maxRetryAfterMs,
      onRetry: (error, retry, delayMs) => {
        log.debug({ url, retry, delayMs, err: errorMessage(error) }, 'retrying request');
      }
    });
  }

  private async fetchOnce(url: string): Promise<Uint8Array> {
    const startedAt = Date.now();
    let response;
    try {
      response = await fetch(url, {
        dispatcher: this.dispatcher,
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: CAPABILITIES_ACCEPT
        }
      });
    } catch (error) {
      throw classifyFetchFailure(error, url, this.options);
    }

    if (!response.ok) {
      await discardBody(response.body, url);
      throw new HttpStatusError(
        url,
        response.status,
        response.statusText,
        parseRetryAfterHeader(response.headers.get('retry-after'))
      );
    }

    const limit = this.options.maxResponseBytes;
    const declared = parseNumericHeader(response.headers.get('content-length'));
    if (declared !== undefined && declared > limit) {
      await discardBody(response.body, url);
      throw new PayloadTooLargeError(url, limit);
    }

    const bytes = await this.readBounded(response.body, url, limit);
    log.debug({ url, status: response.status, bytes: bytes.byteLength, ms: Date.now() - startedAt }, 'fetched');
    return bytes;
  }

  private async readBounded(
    body: ReadableStream<Uint8Array> | null,
    url: string,
    limit: number
  ): Promise<Uint8Array> {
    if (!body) return new Uint8Array(0);

    const reader = body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > limit) {
          await reader.cancel();
          throw new PayloadTooLargeError(url, limit);
        }
        chunks.push(value);
      }
    } catch (error) {
      throw classifyFetchFailure(error, url, this.options);
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks, total);
  }
}

export function createHttpTransport(config: TransportConfig): HttpTransport {
  return new HttpTransport(config);
}
