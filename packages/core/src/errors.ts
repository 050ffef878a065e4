/**
 * Base error for everything the capabilities pipeline raises.
 */
export class OgcError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 502, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.statusCode = statusCode;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidEndpointError extends OgcError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'INVALID_ENDPOINT', 400);
    this.url = url;
  }
}

export type TimeoutPhase = 'connect' | 'read';

export class TimeoutError extends OgcError {
  public readonly url: string;
  public readonly phase: TimeoutPhase;
  public readonly timeoutMs: number;

  constructor(url: string, phase: TimeoutPhase, timeoutMs: number) {
    super(`${phase === 'connect' ? 'Connect' : 'Read'} timeout after ${timeoutMs}ms for ${url}`, 'TIMEOUT', 504);
    this.url = url;
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends OgcError {
  public readonly url: string;
  public readonly httpStatus: number;
  public readonly retryAfterMs?: number;

  constructor(url: string, httpStatus: number, statusText: string, retryAfterMs?: number) {
    super(`${httpStatus} ${statusText} for ${url}`.replace(/\s+/g, ' '), 'HTTP_STATUS', 502);
    this.url = url;
    this.httpStatus = httpStatus;
    this.retryAfterMs = retryAfterMs;
  }
}

export class PayloadTooLargeError extends OgcError {
  public readonly url: string;
  public readonly limitBytes: number;

  constructor(url: string, limitBytes: number) {
    super(`Response from ${url} exceeds ${limitBytes} bytes`, 'PAYLOAD_TOO_LARGE', 502);
    this.url = url;
    this.limitBytes = limitBytes;
  }
}

export class TransportError extends OgcError {
  public readonly url: string;
  /** Set when the socket failed (reset, refused, DNS), as opposed to e.g. a redirect loop. */
  public readonly connectionFailure: boolean;

  constructor(message: string, url: string, options: { cause?: unknown; connectionFailure?: boolean } = {}) {
    super(message, 'TRANSPORT', 502, { cause: options.cause });
    this.url = url;
    this.connectionFailure = options.connectionFailure ?? false;
  }
}

export class MalformedDocumentError extends OgcError {
  constructor(message: string) {
    super(message, 'MALFORMED_DOCUMENT', 502);
  }
}

/**
 * The server answered with an OGC exception report instead of a
 * capabilities document.
 */
export class ServiceExceptionError extends OgcError {
  public readonly exceptionCode?: string;

  constructor(message: string, exceptionCode?: string) {
    super(message, 'SERVICE_EXCEPTION', 502);
    this.exceptionCode = exceptionCode;
  }
}

export class CapabilitiesUnavailableError extends OgcError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CAPABILITIES_UNAVAILABLE', 502, { cause });
  }
}

export class UnknownServiceError extends OgcError {
  public readonly serviceKey: string;

  constructor(serviceKey: string) {
    super(`Unknown service: ${serviceKey}`, 'UNKNOWN_SERVICE', 404);
    this.serviceKey = serviceKey;
  }
}

export class ConfigError extends OgcError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG', 500);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
