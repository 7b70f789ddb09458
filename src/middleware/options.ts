import { ValidationError } from "../errors.js";
import { normalizeProxyInput } from "../proxy/config.js";
import type { TransportCallOptions } from "../transport.js";
import type { RequestOptions, SessionDefaults, StatusHandler } from "../types.js";

/**
 * Transport-level defaults applied to every call
 */
export const DEFAULT_REQUEST_OPTIONS = {
  timeoutMs: 5000,
  verify: false,
} as const;

/**
 * Options after defaults are applied
 */
export interface NormalizedOptions {
  maxRetries: number;
  maxRedirects: number;
  skipStatusCheck: boolean;
  skipRedirects: boolean;
  customStatusHandler?: StatusHandler;
  redirectStopExact?: string;
  redirectStopContains?: string;
  /** Status codes as strings */
  statusesToSkip: Set<string>;
  bypassMiddleware: boolean;
  /** What is handed to the transport on each attempt */
  call: TransportCallOptions;
}

/**
 * `statusesToSkip` in any accepted shape, as a set of strings
 *
 * @example
 * normalizeStatusesToSkip([404, "403"]) // Set { "404", "403" }
 */
export function normalizeStatusesToSkip(value: RequestOptions["statusesToSkip"]): Set<string> {
  if (value === undefined) {
    return new Set();
  }
  const list = Array.isArray(value) ? value : [value];
  return new Set(list.map((status) => String(status).trim()));
}

function assertCount(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${field} must be an integer >= ${min}, got ${value}`, { field });
  }
}

/**
 * Merge per-call options over the session defaults.
 *
 * Redirects are always handled here, never by the engine, so nothing in the
 * result asks the transport to follow them.
 *
 * @throws ValidationError for unusable counts, timeouts or proxies
 */
export function normalizeOptions(options: RequestOptions, defaults: SessionDefaults): NormalizedOptions {
  const maxRetries = options.maxRetries ?? defaults.maxRetries;
  const maxRedirects = options.maxRedirects ?? defaults.maxRedirects;
  const timeoutMs = options.timeoutMs ?? defaults.timeoutMs;

  assertCount(maxRetries, "maxRetries", 1);
  assertCount(maxRedirects, "maxRedirects", 0);
  if (!(timeoutMs > 0)) {
    throw new ValidationError(`timeoutMs must be positive, got ${timeoutMs}`, { field: "timeoutMs" });
  }

  // Fail once up front instead of on every attempt
  normalizeProxyInput(options.proxies);

  return {
    maxRetries,
    maxRedirects,
    skipStatusCheck: options.skipStatusCheck ?? false,
    skipRedirects: options.skipRedirects ?? false,
    customStatusHandler: options.customStatusHandler,
    redirectStopExact: options.redirectStopExact,
    redirectStopContains: options.redirectStopContains,
    statusesToSkip: normalizeStatusesToSkip(options.statusesToSkip),
    bypassMiddleware: options.bypassMiddleware ?? defaults.bypassMiddleware,
    call: {
      timeoutMs,
      verify: options.verify ?? DEFAULT_REQUEST_OPTIONS.verify,
      proxies: options.proxies,
      headers: options.headers,
      cookies: options.cookies,
      params: options.params,
      body: options.body,
      json: options.json,
      form: options.form,
      useMitmWhenActive: options.useMitmWhenActive ?? defaults.useMitmWhenActive,
    },
  };
}
