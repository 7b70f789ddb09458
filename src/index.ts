/**
 * rebound
 *
 * Resilient HTTP sessions over swappable engines: retries, redirect stop
 * predicates, status policy, cookie-jar sync, reset/proxy rotation and
 * JSON snapshots.
 */

// =============================================================================
// Main API exports
// =============================================================================
export { Session } from "./session.js";
export type { SessionOptions } from "./session.js";
export { createSession, restoreSession } from "./session-factory.js";
export type { CreateSessionOptions } from "./session-factory.js";
export { Transport, DEFAULT_TIMEOUT_MS } from "./transport.js";
export type { TransportOptions, TransportCallOptions } from "./transport.js";

// =============================================================================
// Middleware exports
// =============================================================================
export { executeRequest, redirectTargetOf, stopsAt } from "./middleware/orchestrator.js";
export type { RedirectTarget } from "./middleware/orchestrator.js";
export { evaluateStatus } from "./middleware/status-policy.js";
export { normalizeOptions, normalizeStatusesToSkip, DEFAULT_REQUEST_OPTIONS } from "./middleware/options.js";
export type { NormalizedOptions } from "./middleware/options.js";

// =============================================================================
// Lifecycle and snapshot exports
// =============================================================================
export { resetSession, rotateProxy } from "./lifecycle.js";
export type { ResetOptions } from "./lifecycle.js";
export { toDocument, fromDocument, parseDocument, SESSION_CLIENT_TYPES } from "./snapshot.js";
export type { SessionDocument, CookieDocument, SessionClientType } from "./snapshot.js";

// =============================================================================
// Type exports
// =============================================================================
export type {
  HttpMethod,
  ProxyMap,
  ProxyInput,
  QueryParams,
  HeaderMultimap,
  Response,
  StatusHandler,
  CookieScope,
  RequestOptions,
  SessionDefaults,
} from "./types.js";
export { DEFAULT_SESSION_OPTIONS, HTTP_METHODS, getHeader, getHeaderValues } from "./types.js";

// =============================================================================
// Engines, headers, cookies, proxies
// =============================================================================
export { createEngine, defaultEngineConfig, HttpEngine, TlsClientEngine } from "./engines/index.js";
export type {
  Engine,
  EngineName,
  EngineConfig,
  EngineFactory,
  EngineRequest,
  TlsFingerprint,
} from "./engines/index.js";

export { HeaderMap } from "./headers/header-map.js";
export { ChromeHeaderProfile, DEFAULT_HEADER_PROFILES } from "./headers/profile.js";
export type { HeaderProfile, HeaderProfileRegistry } from "./headers/profile.js";

export { CookieJar, createCookie, parseSetCookie, applySetCookies } from "./cookies/index.js";
export type { Cookie } from "./cookies/index.js";

export { FileProxySupplier, acquireProxy } from "./proxy/supplier.js";
export type { ProxySupplier } from "./proxy/supplier.js";
export { parseProxyUrl, formatRawProxy, toRawProxy, redactProxyUrl } from "./proxy/config.js";

// =============================================================================
// Error exports
// =============================================================================
export {
  ReboundError,
  TransportError,
  TimeoutError,
  HttpStatusError,
  AntiBotBlockedError,
  UnauthorizedError,
  NotFoundError,
  RequestError,
  RedirectLimitError,
  AggregateFailure,
  ValidationError,
  SessionClosedError,
  ErrorCode,
  wrapError,
} from "./errors.js";
export type { AttemptError } from "./errors.js";

// =============================================================================
// Logger
// =============================================================================
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
