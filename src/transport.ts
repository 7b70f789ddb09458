/**
 * Transport: an engine plus the state sent with every request
 * (headers, cookie jar, proxies).
 *
 * Exactly the members callers may use; nothing is forwarded to the engine.
 */

import { CookieJar } from "./cookies/jar.js";
import type { Engine } from "./engines/types.js";
import { HeaderMap, type HeaderInit } from "./headers/header-map.js";
import { normalizeProxyInput, proxyForUrl, redactProxyUrl } from "./proxy/config.js";
import { logger as defaultLogger, type Logger } from "./utils/logger.js";
import { detectDebugProxy } from "./utils/debug-proxy.js";
import type { HttpMethod, ProxyInput, ProxyMap, QueryParams, RequestOptions, Response } from "./types.js";

/**
 * Per-call options the transport itself understands
 */
export type TransportCallOptions = Pick<
  RequestOptions,
  "timeoutMs" | "verify" | "proxies" | "headers" | "cookies" | "params" | "body" | "json" | "form" | "useMitmWhenActive"
>;

export interface TransportOptions {
  engine: Engine;
  headers?: HeaderInit;
  cookies?: CookieJar;
  proxies?: ProxyInput;
  logger?: Logger;
}

/** Per-attempt timeout when a call does not set one */
export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Append query parameters. The URL is left untouched when there are none.
 */
export function withParams(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const entries = Object.entries(params).filter(
    (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
  );
  if (entries.length === 0) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of entries) {
    target.searchParams.append(key, String(value));
  }
  return target.toString();
}

/**
 * Encode the call's body, returning the content type it implies
 */
export function encodeBody(options: TransportCallOptions): { body?: string; contentType?: string } {
  if (options.json !== undefined) {
    return { body: JSON.stringify(options.json), contentType: "application/json" };
  }

  if (options.form) {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(options.form)) {
      form.append(key, String(value));
    }
    return { body: form.toString(), contentType: "application/x-www-form-urlencoded" };
  }

  return { body: options.body };
}

export class Transport {
  readonly engine: Engine;
  readonly headers: HeaderMap;
  readonly cookies: CookieJar;
  private proxies_: ProxyMap = {};
  /** Set when the proxy map changed since the engine last dropped old pools */
  private proxiesChanged = false;
  private readonly logger: Logger;

  constructor(options: TransportOptions) {
    this.engine = options.engine;
    this.headers = new HeaderMap(options.headers);
    this.cookies = options.cookies ?? new CookieJar();
    this.logger = options.logger ?? defaultLogger;
    this.setProxies(options.proxies);
    // A new engine has nothing pooled yet
    this.proxiesChanged = false;
  }

  /**
   * Copy of the current proxy map; empty when no proxy is set
   */
  get proxies(): ProxyMap {
    return { ...this.proxies_ };
  }

  /**
   * Replace the proxy configuration.
   *
   * A string applies to both schemes. Empty input changes nothing.
   * @throws ValidationError when a map has neither http nor https; the
   *   previous configuration is kept
   */
  setProxies(input: ProxyInput | null | undefined): void {
    const next = normalizeProxyInput(input);
    if (next === null) {
      return;
    }
    this.proxies_ = next;
    this.proxiesChanged = true;
  }

  clearProxies(): void {
    this.proxies_ = {};
    this.proxiesChanged = true;
  }

  /**
   * Close the engine's pooled connections to proxies no longer configured
   */
  async releaseUnusedProxies(): Promise<void> {
    this.proxiesChanged = false;
    const current = [this.proxies_.http, this.proxies_.https].filter(
      (proxy): proxy is string => proxy !== undefined
    );
    await this.engine.retainProxies(current);
  }

  /**
   * One request through the engine. Redirects come back as responses.
   */
  async request(method: HttpMethod, url: string, options: TransportCallOptions = {}): Promise<Response> {
    if (this.proxiesChanged) {
      await this.releaseUnusedProxies();
    }

    const target = withParams(url, options.params);
    const verify = options.verify ?? false;
    const { body, contentType } = encodeBody(options);

    const headers = this.headers.clone();
    if (options.headers) {
      headers.update(options.headers);
    }
    if (contentType && !headers.has("content-type")) {
      headers.set("Content-Type", contentType);
    }

    const cookieHeader = this.cookies.headerFor(target, options.cookies);
    if (cookieHeader) {
      headers.set("Cookie", cookieHeader);
    }
    headers.reorder(this.engine.config.headerOrder);

    const proxyUrl = await this.resolveProxy(target, options, verify);

    return this.engine.send({
      method,
      url: target,
      headers: Array.from(headers),
      body,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      verify,
      proxyUrl,
    });
  }

  private async resolveProxy(url: string, options: TransportCallOptions, verify: boolean): Promise<string | undefined> {
    if (options.useMitmWhenActive && !verify) {
      const debugProxy = await detectDebugProxy();
      if (debugProxy) {
        this.logger.debug(`[transport] Routing through debugging proxy ${debugProxy}`);
        return debugProxy;
      }
    }

    const proxies = normalizeProxyInput(options.proxies) ?? this.proxies_;
    const proxy = proxyForUrl(proxies, url);
    if (proxy) {
      this.logger.trace(`[transport] Using proxy ${redactProxyUrl(proxy)}`);
    }
    return proxy;
  }

  get(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("GET", url, options);
  }

  post(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("POST", url, options);
  }

  put(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("PUT", url, options);
  }

  delete(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("DELETE", url, options);
  }

  options(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("OPTIONS", url, options);
  }

  head(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("HEAD", url, options);
  }

  patch(url: string, options?: TransportCallOptions): Promise<Response> {
    return this.request("PATCH", url, options);
  }

  /**
   * Release the engine's sockets
   */
  async close(): Promise<void> {
    await this.engine.close();
  }
}
