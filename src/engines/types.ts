/**
 * Engine types
 *
 * Two engines sit behind every transport, selected by tag:
 * 1. http - undici fetch, plain Node TLS
 * 2. tlsclient - got-scraping with a configurable TLS/HTTP2 fingerprint
 */

import type { HttpMethod, Response } from "../types.js";

/**
 * Available engine names
 */
export type EngineName = "http" | "tlsclient";

/**
 * Header-generator hints passed to got-scraping
 */
export interface HeaderGeneratorOptions {
  browsers?: Array<string | { name: string; minVersion?: number; maxVersion?: number }>;
  devices?: string[];
  operatingSystems?: string[];
  locales?: string[];
}

export type TlsVersion = "TLSv1.2" | "TLSv1.3";

/**
 * Low-level negotiation parameters of the tlsclient engine.
 * A reset copies these from the old engine.
 */
export interface TlsFingerprint {
  /** OpenSSL cipher list, in ClientHello order */
  ciphers?: string;
  /** Colon-separated signature algorithms */
  signatureAlgorithms?: string;
  /** Colon-separated key-share curves */
  ecdhCurve?: string;
  minVersion?: TlsVersion;
  maxVersion?: TlsVersion;
  /** Negotiate HTTP/2 through ALPN */
  http2?: boolean;
  /** Let got-scraping generate headers matching the fingerprint */
  headerGeneratorOptions?: HeaderGeneratorOptions;
}

interface BaseEngineConfig {
  /** Browser/client the engine emulates ("chrome_120"), also fed to the header profile */
  clientIdentifier: string;
  /** Order headers are sent in */
  headerOrder: string[];
}

export interface HttpEngineConfig extends BaseEngineConfig {
  kind: "http";
}

export interface TlsClientEngineConfig extends BaseEngineConfig {
  kind: "tlsclient";
  fingerprint: TlsFingerprint;
}

/**
 * Engine configuration, discriminated by `kind`
 */
export type EngineConfig = HttpEngineConfig | TlsClientEngineConfig;

/**
 * One outgoing request, fully resolved by the transport
 */
export interface EngineRequest {
  method: HttpMethod;
  url: string;
  /** Ordered header pairs */
  headers: Array<[string, string]>;
  body?: string;
  timeoutMs: number;
  verify: boolean;
  proxyUrl?: string;
}

/**
 * Engine interface - both engines implement this
 */
export interface Engine {
  readonly name: EngineName;
  /** Engine configuration */
  readonly config: EngineConfig;

  /**
   * Perform one request. Redirects are never followed here.
   * @throws TransportError or TimeoutError on failure
   */
  send(request: EngineRequest): Promise<Response>;

  /**
   * Close pooled connections to every proxy not listed
   */
  retainProxies(proxyUrls: readonly string[]): Promise<void>;

  /**
   * Release sockets and agents
   */
  close(): Promise<void>;
}

/**
 * Builds an engine from its config; swapped out in tests
 */
export type EngineFactory = (config: EngineConfig) => Engine;

/**
 * Default client identifiers
 */
export const DEFAULT_CLIENT_IDENTIFIERS: Record<EngineName, string> = {
  http: "128",
  tlsclient: "chrome_120",
};
