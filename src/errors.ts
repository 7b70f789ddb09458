/**
 * Typed error classes for rebound
 *
 * Every failure an attempt can hit is classified into one of these before the
 * orchestrator records it, so callers only ever see a `Response` or an
 * `AggregateFailure` from a middleware call.
 */

import type { Response } from "./types.js";

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // Transport errors
  TRANSPORT_ERROR = "TRANSPORT_ERROR",
  TIMEOUT = "TIMEOUT",

  // Status policy
  ANTI_BOT_BLOCKED = "ANTI_BOT_BLOCKED",
  UNAUTHORIZED = "UNAUTHORIZED",
  NOT_FOUND = "NOT_FOUND",
  HTTP_STATUS = "HTTP_STATUS",

  // Generic request failures (custom status handlers, unclassified errors)
  REQUEST_ERROR = "REQUEST_ERROR",
  REDIRECT_LIMIT = "REDIRECT_LIMIT",
  RETRIES_EXHAUSTED = "RETRIES_EXHAUSTED",

  // Validation errors
  INVALID_OPTIONS = "INVALID_OPTIONS",
  INVALID_PROXY = "INVALID_PROXY",
  INVALID_DOCUMENT = "INVALID_DOCUMENT",

  // Session state
  SESSION_CLOSED = "SESSION_CLOSED",
}

/**
 * Base error class for all rebound errors
 */
export class ReboundError extends Error {
  readonly code: ErrorCode;
  readonly url?: string;
  readonly cause?: Error;
  readonly timestamp: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      url?: string;
      cause?: Error;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "ReboundError";
    this.code = code;
    this.url = options?.url;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.retryable = options?.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      url: this.url,
      timestamp: this.timestamp,
      retryable: this.retryable,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Connection refused/reset, DNS failure, TLS handshake failure
 */
export class TransportError extends ReboundError {
  /** Low-level error code when the engine reported one (ECONNREFUSED, ENOTFOUND, ...) */
  readonly errno?: string;

  constructor(message: string, options?: { url?: string; cause?: Error; errno?: string }) {
    super(message, ErrorCode.TRANSPORT_ERROR, {
      url: options?.url,
      cause: options?.cause,
      retryable: true,
    });
    this.name = "TransportError";
    this.errno = options?.errno;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errno: this.errno,
    };
  }
}

/**
 * A single attempt exceeded its deadline
 */
export class TimeoutError extends ReboundError {
  readonly timeoutMs: number;

  /**
   * @param timeoutMs - Deadline that passed; 0 when the library did not report one
   * @param options.message - Replaces the default "Timeout after Nms" text
   */
  constructor(timeoutMs: number, options?: { url?: string; cause?: Error; message?: string }) {
    super(options?.message ?? `Timeout after ${timeoutMs}ms`, ErrorCode.TIMEOUT, {
      url: options?.url,
      cause: options?.cause,
      retryable: true,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * Response status rejected by the status policy
 */
export class HttpStatusError extends ReboundError {
  readonly statusCode: number;
  readonly response?: Response;

  constructor(
    statusCode: number,
    options?: { message?: string; response?: Response; code?: ErrorCode }
  ) {
    super(
      options?.message ?? `Response status code is not 200 [${statusCode}]`,
      options?.code ?? ErrorCode.HTTP_STATUS,
      {
        url: options?.response?.requestUrl,
        retryable: true,
      }
    );
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
    this.response = options?.response;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

/**
 * 403: the target's anti-bot layer refused the request
 */
export class AntiBotBlockedError extends HttpStatusError {
  constructor(response?: Response) {
    super(403, { message: "Blocked by AntiBot [403]", response, code: ErrorCode.ANTI_BOT_BLOCKED });
    this.name = "AntiBotBlockedError";
  }
}

/**
 * 401
 */
export class UnauthorizedError extends HttpStatusError {
  constructor(response?: Response) {
    super(401, { message: "Unauthorized [401]", response, code: ErrorCode.UNAUTHORIZED });
    this.name = "UnauthorizedError";
  }
}

/**
 * 404
 */
export class NotFoundError extends HttpStatusError {
  constructor(response?: Response) {
    super(404, { message: "Page not found [404]", response, code: ErrorCode.NOT_FOUND });
    this.name = "NotFoundError";
  }
}

/**
 * Generic request failure: raised by custom status handlers or anything
 * that could not be classified more precisely
 */
export class RequestError extends ReboundError {
  constructor(message: string, options?: { url?: string; cause?: Error }) {
    super(message, ErrorCode.REQUEST_ERROR, {
      ...options,
      retryable: true,
    });
    this.name = "RequestError";
  }
}

/**
 * Redirect chain exceeded its hop budget
 */
export class RedirectLimitError extends ReboundError {
  readonly maxRedirects: number;

  constructor(maxRedirects: number, url?: string) {
    super(`Exceeded ${maxRedirects} redirects`, ErrorCode.REDIRECT_LIMIT, {
      url,
      retryable: false,
    });
    this.name = "RedirectLimitError";
    this.maxRedirects = maxRedirects;
  }
}

/**
 * One failed attempt inside a middleware call
 */
export interface AttemptError {
  /** 1-based attempt number */
  attempt: number;
  kind: ErrorCode;
  message: string;
  url: string;
  error: ReboundError;
}

/**
 * Terminal failure of a middleware call: every attempt failed
 */
export class AggregateFailure extends ReboundError {
  readonly attempts: AttemptError[];

  constructor(message: string, attempts: AttemptError[], url?: string) {
    const last = attempts[attempts.length - 1];
    super(message, ErrorCode.RETRIES_EXHAUSTED, {
      url,
      cause: last?.error,
      retryable: false,
    });
    this.name = "AggregateFailure";
    this.attempts = attempts;
  }

  /**
   * Classified errors in attempt order
   */
  get errors(): ReboundError[] {
    return this.attempts.map((a) => a.error);
  }

  getLastError(): AttemptError | undefined {
    return this.attempts[this.attempts.length - 1];
  }

  /**
   * Numbered, one line per attempt
   */
  describe(): string {
    const lines = this.attempts.map((a, index) => `${index}. [${a.error.name}]: ${a.message}`);
    return [this.message, ...lines].join("\n");
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts.map((a) => ({
        attempt: a.attempt,
        kind: a.kind,
        message: a.message,
        url: a.url,
      })),
    };
  }
}

/**
 * Validation errors (proxies, options, persisted documents)
 */
export class ValidationError extends ReboundError {
  readonly field?: string;

  constructor(message: string, options?: { field?: string; code?: ErrorCode; cause?: Error }) {
    super(message, options?.code ?? ErrorCode.INVALID_OPTIONS, {
      cause: options?.cause,
      retryable: false,
    });
    this.name = "ValidationError";
    this.field = options?.field;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * Session state errors
 */
export class SessionClosedError extends ReboundError {
  constructor() {
    super("Session has been closed. Create a new session to continue.", ErrorCode.SESSION_CLOSED, {
      retryable: false,
    });
    this.name = "SessionClosedError";
  }
}

/**
 * Low-level error code (ECONNREFUSED, UND_ERR_CONNECT_TIMEOUT, ...) from an
 * error or anywhere down its cause chain
 */
export function errnoOf(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  return errnoOf(error.cause);
}

/**
 * Helper to wrap unknown errors in ReboundError
 */
export function wrapError(error: unknown, url?: string): ReboundError {
  if (error instanceof ReboundError) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (error.name === "AbortError" || message.includes("timeout") || message.includes("timed out")) {
      return new TimeoutError(0, { url, cause: error, message: `Timeout: ${error.message}` });
    }

    if (message.includes("econnrefused") || message.includes("connection refused")) {
      return new TransportError(`Connection refused: ${error.message}`, { url, cause: error, errno: "ECONNREFUSED" });
    }

    if (message.includes("econnreset") || message.includes("socket hang up")) {
      return new TransportError(`Connection reset: ${error.message}`, { url, cause: error, errno: "ECONNRESET" });
    }

    if (message.includes("enotfound") || message.includes("dns")) {
      return new TransportError(`DNS lookup failed: ${error.message}`, { url, cause: error, errno: "ENOTFOUND" });
    }

    return new RequestError(error.message, { url, cause: error });
  }

  return new RequestError(String(error), { url });
}
