/**
 * Session - the caller-facing client
 *
 * Owns one transport at a time, the header profile that seeds it and the
 * middleware defaults every call starts from.
 *
 * @example
 * const session = new Session({ engine: "tlsclient" });
 * const response = await session.get("https://example.com", { maxRetries: 5 });
 * await session.close();
 */

import type { CookieJar } from "./cookies/jar.js";
import { createCookie, type Cookie } from "./cookies/cookie.js";
import { createEngine, defaultEngineConfig } from "./engines/index.js";
import type { Engine, EngineConfig, EngineFactory, EngineName } from "./engines/types.js";
import { SessionClosedError } from "./errors.js";
import { ChromeHeaderProfile, type HeaderProfile } from "./headers/profile.js";
import type { HeaderMap } from "./headers/header-map.js";
import { resetSession, rotateProxy, type ResetOptions } from "./lifecycle.js";
import { executeRequest } from "./middleware/orchestrator.js";
import { FileProxySupplier, type ProxySupplier } from "./proxy/supplier.js";
import { Transport } from "./transport.js";
import { DEFAULT_SESSION_OPTIONS } from "./types.js";
import type { HttpMethod, ProxyInput, ProxyMap, RequestOptions, Response, SessionDefaults } from "./types.js";
import { logger as defaultLogger, type Logger } from "./utils/logger.js";

export interface SessionOptions extends Partial<SessionDefaults> {
  /** Engine kind or a full engine config (default: "http") */
  engine?: EngineName | EngineConfig;
  /** Builds engines from configs; replaced in tests */
  engineFactory?: EngineFactory;
  /** Baseline header source (default: ChromeHeaderProfile) */
  headerProfile?: HeaderProfile;
  /** Headers applied over the profile's */
  headers?: Record<string, string>;
  proxies?: ProxyInput;
  /** Proxy source for rotation (default: FileProxySupplier) */
  proxySupplier?: ProxySupplier;
  /** Passed to the supplier on every rotation */
  proxySourcePath?: string;
  logger?: Logger;
}

export class Session {
  readonly defaults: SessionDefaults;
  readonly engineFactory: EngineFactory;
  readonly proxySupplier: ProxySupplier;
  readonly proxySourcePath?: string;
  readonly logger: Logger;
  headerProfile: HeaderProfile;

  private transport_: Transport;
  private closed = false;

  constructor(options: SessionOptions = {}) {
    this.defaults = {
      maxRetries: options.maxRetries ?? DEFAULT_SESSION_OPTIONS.maxRetries,
      maxRedirects: options.maxRedirects ?? DEFAULT_SESSION_OPTIONS.maxRedirects,
      timeoutMs: options.timeoutMs ?? DEFAULT_SESSION_OPTIONS.timeoutMs,
      bypassMiddleware: options.bypassMiddleware ?? DEFAULT_SESSION_OPTIONS.bypassMiddleware,
      useMitmWhenActive: options.useMitmWhenActive ?? DEFAULT_SESSION_OPTIONS.useMitmWhenActive,
      cookieScope: options.cookieScope ?? DEFAULT_SESSION_OPTIONS.cookieScope,
    };
    this.engineFactory = options.engineFactory ?? createEngine;
    this.headerProfile = options.headerProfile ?? new ChromeHeaderProfile();
    this.proxySupplier = options.proxySupplier ?? new FileProxySupplier();
    this.proxySourcePath = options.proxySourcePath;
    this.logger = options.logger ?? defaultLogger;

    const config =
      typeof options.engine === "object"
        ? options.engine
        : defaultEngineConfig(options.engine ?? "http", { headerOrder: this.headerProfile.getHeaderOrder() });

    this.transport_ = new Transport({
      engine: this.engineFactory(config),
      headers: this.headerProfile.getHeaders(config.clientIdentifier),
      proxies: options.proxies,
      logger: this.logger,
    });

    if (options.headers) {
      this.transport_.headers.update(options.headers);
    }
  }

  get transport(): Transport {
    return this.transport_;
  }

  get engine(): Engine {
    return this.transport_.engine;
  }

  get headers(): HeaderMap {
    return this.transport_.headers;
  }

  get cookies(): CookieJar {
    return this.transport_.cookies;
  }

  get proxies(): ProxyMap {
    return this.transport_.proxies;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new SessionClosedError();
    }
  }

  // ============================================================================
  // Requests
  // ============================================================================

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    this.ensureOpen();
    return executeRequest(this.transport_, method, url, options, {
      defaults: this.defaults,
      logger: this.logger,
    });
  }

  get(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("GET", url, options);
  }

  post(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("POST", url, options);
  }

  put(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("PUT", url, options);
  }

  delete(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("DELETE", url, options);
  }

  options(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("OPTIONS", url, options);
  }

  head(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("HEAD", url, options);
  }

  patch(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("PATCH", url, options);
  }

  // ============================================================================
  // Headers, cookies, proxies
  // ============================================================================

  /**
   * Merge headers over the current ones
   */
  updateHeaders(headers: Record<string, string>): void {
    this.transport_.headers.update(headers);
  }

  /**
   * Replace every header, keeping the given order
   */
  setHeaders(headers: Record<string, string>): void {
    this.transport_.headers.replace(headers);
  }

  setCookie(name: string, value: string, domain: string = ""): Cookie {
    return this.transport_.cookies.setValue(name, value, domain);
  }

  /**
   * Add plain name/value pairs, or full cookie records
   */
  setCookies(cookies: Record<string, string> | Cookie[]): void {
    if (Array.isArray(cookies)) {
      for (const cookie of cookies) {
        this.transport_.cookies.set(createCookie(cookie));
      }
      return;
    }
    this.transport_.cookies.update(cookies);
  }

  deleteCookies(names: string | string[], domain?: string): number {
    return this.transport_.cookies.delete(names, domain);
  }

  clearCookies(except: string | string[] = []): void {
    this.transport_.cookies.clear(except);
  }

  setProxies(proxies: ProxyInput | null | undefined): void {
    this.transport_.setProxies(proxies);
  }

  clearProxies(): void {
    this.transport_.clearProxies();
  }

  /**
   * Take cookies, headers, proxies and header profile from another session
   */
  copyEssentials(other: Session): void {
    const cookies = other.cookies.clone();
    this.transport_.cookies.clear();
    for (const cookie of cookies) {
      this.transport_.cookies.set(cookie);
    }

    this.transport_.headers.replace(other.headers);
    this.transport_.clearProxies();
    this.transport_.setProxies(other.proxies);
    this.headerProfile = other.headerProfile;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Rebuild the engine from its current config, optionally rotating the proxy
   */
  async reset(options: ResetOptions = {}): Promise<void> {
    this.ensureOpen();
    await resetSession(this, options);
  }

  /**
   * Pick a new proxy without rebuilding the engine
   */
  async rotateProxy(explicit?: ProxyInput, proxySourcePath?: string): Promise<void> {
    this.ensureOpen();
    await rotateProxy(this, explicit, proxySourcePath);
  }

  /**
   * Install a replacement transport; the previous one must already be closed
   * @internal
   */
  replaceTransport(transport: Transport): void {
    this.transport_ = transport;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.transport_.close();
  }
}
