import type { EngineName } from "./engines/types.js";
import type { Logger } from "./utils/logger.js";

/**
 * HTTP verbs the transport exposes
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "OPTIONS" | "HEAD" | "PATCH";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE", "OPTIONS", "HEAD", "PATCH"];

/**
 * Proxy per URL scheme. An empty object means no proxy.
 */
export type ProxyMap = {
  http?: string;
  https?: string;
};

/**
 * What proxy setters accept: one URL for both schemes, or a scheme map.
 * Extra scheme keys are tolerated but only `http`/`https` are used.
 */
export type ProxyInput = string | (ProxyMap & Record<string, string | undefined>);

/**
 * Query string values
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Response header multimap, keyed by lower-cased header name
 */
export type HeaderMultimap = Record<string, string[]>;

/**
 * Result of one logical call
 */
export interface Response {
  /** HTTP status code */
  status: number;
  /** Reason phrase, when the engine reports one */
  statusText: string;
  /** Response headers */
  headers: HeaderMultimap;
  /** Decoded body */
  body: string;
  /**
   * Final URL of the call. For a redirect response that was not followed
   * (skipRedirects or a stop predicate) this is the redirect target.
   */
  url: string;
  /** URL this response was actually fetched from */
  requestUrl: string;
  /** Engine that produced this response */
  engine: EngineName;
  /** Time taken by the transport call in milliseconds */
  duration: number;
}

/**
 * Custom status check. Throwing (or rejecting) fails the attempt.
 */
export type StatusHandler = (response: Response) => void | Promise<void>;

/**
 * Cookie deletion scope used when a Set-Cookie replaces an existing entry
 */
export type CookieScope = "name" | "name-domain";

/**
 * Per-call options
 */
export interface RequestOptions {
  /** Per-attempt timeout in milliseconds (default: 5000) */
  timeoutMs?: number;

  /** Verify TLS certificates (default: false) */
  verify?: boolean;

  /** Proxy override for this call */
  proxies?: ProxyInput;

  /** Headers merged over the session headers for this call */
  headers?: Record<string, string>;

  /** Cookies sent with this call on top of the jar */
  cookies?: Record<string, string>;

  /** Query string; dropped after the first redirect hop */
  params?: QueryParams;

  /** Raw request body */
  body?: string;

  /** JSON body (sets content-type) */
  json?: unknown;

  /** Form body, sent as application/x-www-form-urlencoded */
  form?: Record<string, string | number | boolean>;

  // ============================================================================
  // Middleware options
  // ============================================================================

  /** Attempts before giving up (default: session setting, 3) */
  maxRetries?: number;

  /** Redirect hops followed before giving up (default: session setting, 30) */
  maxRedirects?: number;

  /** Skip the status policy */
  skipStatusCheck?: boolean;

  /** Return redirect responses instead of following them */
  skipRedirects?: boolean;

  /** Replaces the built-in status classification for this call */
  customStatusHandler?: StatusHandler;

  /** Stop following redirects when the target equals this URL */
  redirectStopExact?: string;

  /** Stop following redirects when the target contains this substring */
  redirectStopContains?: string;

  /** Status codes that always pass the status policy */
  statusesToSkip?: number | string | Array<number | string>;

  /** Single raw transport call: no retries, cookie sync or status policy */
  bypassMiddleware?: boolean;

  /** Route through a local debugging proxy when one is listening and verify is off */
  useMitmWhenActive?: boolean;
}

/**
 * Session construction options
 */
export interface SessionDefaults {
  /** Default attempts per call (default: 3) */
  maxRetries: number;
  /** Default redirect hop budget per call (default: 30) */
  maxRedirects: number;
  /** Default per-attempt timeout in milliseconds (default: 5000) */
  timeoutMs: number;
  /** Every call bypasses the middleware unless overridden (default: false) */
  bypassMiddleware: boolean;
  /** Use a local debugging proxy when one is listening (default: false) */
  useMitmWhenActive: boolean;
  /** Set-Cookie replacement scope (default: "name") */
  cookieScope: CookieScope;
}

export const DEFAULT_SESSION_OPTIONS: SessionDefaults = {
  maxRetries: 3,
  maxRedirects: 30,
  timeoutMs: 5000,
  bypassMiddleware: false,
  useMitmWhenActive: false,
  cookieScope: "name",
};

/**
 * Context the orchestrator needs from its caller
 */
export interface CallContext {
  defaults: SessionDefaults;
  logger: Logger;
}

/**
 * First value of a response header
 */
export function getHeader(response: Pick<Response, "headers">, name: string): string | undefined {
  return response.headers[name.toLowerCase()]?.[0];
}

/**
 * All values of a response header
 */
export function getHeaderValues(response: Pick<Response, "headers">, name: string): string[] {
  return response.headers[name.toLowerCase()] ?? [];
}
