/**
 * HTTP Engine - undici fetch
 *
 * Plain Node TLS, keep-alive pooling per proxy/verify combination.
 * Redirects are returned, never followed.
 */

import { Agent, fetch, ProxyAgent, type Dispatcher, type Headers } from "undici";
import type { Engine, EngineRequest, HttpEngineConfig } from "../types.js";
import { errnoOf, TimeoutError, TransportError } from "../../errors.js";
import type { HeaderMultimap, Response } from "../../types.js";

/**
 * undici error codes that mean a deadline passed
 */
const TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT", "ETIMEDOUT"]);

/**
 * Convert fetch Headers to a multimap, keeping each Set-Cookie separate
 */
export function headersToMultimap(headers: Headers): HeaderMultimap {
  const record: HeaderMultimap = {};
  headers.forEach((value, key) => {
    const name = key.toLowerCase();
    if (name === "set-cookie") return;
    (record[name] ??= []).push(value);
  });

  const setCookies = headers.getSetCookie();
  if (setCookies.length > 0) {
    record["set-cookie"] = setCookies;
  }
  return record;
}

/**
 * HTTP Engine implementation using undici fetch
 */
export class HttpEngine implements Engine {
  readonly name = "http";
  readonly config: HttpEngineConfig;
  private dispatchers = new Map<string, { proxyUrl?: string; dispatcher: Dispatcher }>();

  constructor(config: HttpEngineConfig) {
    this.config = config;
  }

  /**
   * Pooled dispatcher for a proxy/verify combination
   */
  private dispatcherFor(proxyUrl: string | undefined, verify: boolean): Dispatcher {
    const key = `${proxyUrl ?? "direct"}|${verify ? "verify" : "insecure"}`;
    const pooled = this.dispatchers.get(key);
    if (pooled) {
      return pooled.dispatcher;
    }

    const dispatcher = proxyUrl
      ? new ProxyAgent({ uri: proxyUrl, requestTls: { rejectUnauthorized: verify } })
      : new Agent({ connect: { rejectUnauthorized: verify } });
    this.dispatchers.set(key, { proxyUrl, dispatcher });
    return dispatcher;
  }

  /**
   * Proxy URLs that currently have a pooled agent
   */
  get pooledProxies(): string[] {
    const urls = new Set<string>();
    for (const { proxyUrl } of this.dispatchers.values()) {
      if (proxyUrl) urls.add(proxyUrl);
    }
    return Array.from(urls);
  }

  async retainProxies(proxyUrls: readonly string[]): Promise<void> {
    const keep = new Set(proxyUrls);
    const stale: Dispatcher[] = [];
    for (const [key, { proxyUrl, dispatcher }] of this.dispatchers) {
      if (proxyUrl && !keep.has(proxyUrl)) {
        this.dispatchers.delete(key);
        stale.push(dispatcher);
      }
    }
    await Promise.all(stale.map((dispatcher) => dispatcher.close()));
  }

  async send(request: EngineRequest): Promise<Response> {
    const startTime = Date.now();
    const { url, timeoutMs } = request;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: "manual",
        signal: controller.signal,
        dispatcher: this.dispatcherFor(request.proxyUrl, request.verify),
      });

      // Body read stays under the same deadline
      const body = await response.text();

      return {
        status: response.status,
        statusText: response.statusText,
        headers: headersToMultimap(response.headers),
        body,
        url,
        requestUrl: url,
        engine: "http",
        duration: Date.now() - startTime,
      };
    } catch (error: unknown) {
      if (error instanceof Error) {
        const errno = errnoOf(error);

        if (error.name === "AbortError" || (errno !== undefined && TIMEOUT_CODES.has(errno))) {
          throw new TimeoutError(timeoutMs, { url, cause: error });
        }

        const reason = error.cause instanceof Error ? error.cause.message : error.message;
        throw new TransportError(`[http] ${reason}`, { url, cause: error, errno });
      }

      throw new TransportError(`[http] ${String(error)}`, { url });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    const pooled = Array.from(this.dispatchers.values());
    this.dispatchers.clear();
    await Promise.all(pooled.map(({ dispatcher }) => dispatcher.close()));
  }
}
