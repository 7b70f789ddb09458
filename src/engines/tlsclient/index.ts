/**
 * TLS Client Engine - got-scraping
 *
 * Browser-like TLS fingerprinting: cipher order, signature algorithms,
 * key-share curves and ALPN come from the engine config.
 */

import { gotScraping } from "got-scraping";
import type { Engine, EngineRequest, TlsClientEngineConfig } from "../types.js";
import { errnoOf, TimeoutError, TransportError } from "../../errors.js";
import type { HeaderMultimap, Response } from "../../types.js";

/**
 * Percent-encode characters a server would reject in a request line
 * (spaces, non-ASCII in redirect targets). Existing escapes are kept.
 */
export function encodeRequestUrl(url: string): string {
  return encodeURI(url).replace(/%25([0-9A-Fa-f]{2})/g, "%$1");
}

/**
 * Node's incoming headers as a multimap
 */
function toMultimap(headers: Record<string, string | string[] | undefined>): HeaderMultimap {
  const record: HeaderMultimap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    record[key.toLowerCase()] = Array.isArray(value) ? value : [value];
  }
  return record;
}

/**
 * TLS Client Engine implementation using got-scraping
 */
export class TlsClientEngine implements Engine {
  readonly name = "tlsclient";
  readonly config: TlsClientEngineConfig;

  constructor(config: TlsClientEngineConfig) {
    this.config = config;
  }

  async send(request: EngineRequest): Promise<Response> {
    const startTime = Date.now();
    const { timeoutMs } = request;
    const url = encodeRequestUrl(request.url);
    const { fingerprint } = this.config;

    try {
      const response = await gotScraping({
        url,
        method: request.method,
        headers: Object.fromEntries(request.headers),
        body: request.body,
        http2: fingerprint.http2 ?? false,
        followRedirect: false,
        throwHttpErrors: false,
        retry: { limit: 0 },
        timeout: {
          request: timeoutMs,
        },
        https: {
          rejectUnauthorized: request.verify,
          ciphers: fingerprint.ciphers,
          signatureAlgorithms: fingerprint.signatureAlgorithms,
          ecdhCurve: fingerprint.ecdhCurve,
          minVersion: fingerprint.minVersion,
          maxVersion: fingerprint.maxVersion,
        },
        // got-scraping reads its own options from the request context
        context: {
          proxyUrl: request.proxyUrl,
          useHeaderGenerator: fingerprint.headerGeneratorOptions !== undefined,
          headerGeneratorOptions: fingerprint.headerGeneratorOptions,
        },
      });

      return {
        status: response.statusCode,
        statusText: response.statusMessage ?? "",
        headers: toMultimap(response.headers),
        body: response.body,
        url: request.url,
        requestUrl: request.url,
        engine: "tlsclient",
        duration: Date.now() - startTime,
      };
    } catch (error: unknown) {
      if (error instanceof Error) {
        if (error.name === "TimeoutError" || error.message.includes("timeout")) {
          throw new TimeoutError(timeoutMs, { url: request.url, cause: error });
        }

        throw new TransportError(`[tlsclient] ${error.message}`, {
          url: request.url,
          cause: error,
          errno: errnoOf(error),
        });
      }

      throw new TransportError(`[tlsclient] ${String(error)}`, { url: request.url });
    }
  }

  /**
   * got-scraping keeps no per-engine sockets
   */
  async retainProxies(): Promise<void> {}

  async close(): Promise<void> {}
}
