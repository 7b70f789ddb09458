/**
 * Transport engines
 *
 *   1. http - undici fetch, fastest, plain Node TLS
 *   2. tlsclient - TLS fingerprinting via got-scraping
 *
 * @example
 * import { createEngine, defaultEngineConfig } from './engines';
 *
 * const engine = createEngine(defaultEngineConfig('tlsclient'));
 * const response = await engine.send({ method: 'GET', url, headers: [], timeoutMs: 5000, verify: false });
 */

import { HttpEngine } from "./http/index.js";
import { TlsClientEngine } from "./tlsclient/index.js";
import { DEFAULT_CLIENT_IDENTIFIERS } from "./types.js";
import type { Engine, EngineConfig, EngineName, TlsFingerprint } from "./types.js";

export type {
  EngineName,
  Engine,
  EngineConfig,
  EngineFactory,
  EngineRequest,
  HttpEngineConfig,
  TlsClientEngineConfig,
  TlsFingerprint,
  TlsVersion,
  HeaderGeneratorOptions,
} from "./types.js";

export { DEFAULT_CLIENT_IDENTIFIERS } from "./types.js";
export { HttpEngine, headersToMultimap } from "./http/index.js";
export { TlsClientEngine, encodeRequestUrl } from "./tlsclient/index.js";

/**
 * Build the engine a config describes
 */
export function createEngine(config: EngineConfig): Engine {
  switch (config.kind) {
    case "http":
      return new HttpEngine(config);
    case "tlsclient":
      return new TlsClientEngine(config);
  }
}

/**
 * Config for an engine kind with the stock client identifier
 */
export function defaultEngineConfig(
  kind: EngineName,
  options: { clientIdentifier?: string; headerOrder?: string[]; fingerprint?: TlsFingerprint } = {}
): EngineConfig {
  const clientIdentifier = options.clientIdentifier ?? DEFAULT_CLIENT_IDENTIFIERS[kind];
  const headerOrder = options.headerOrder ?? [];

  if (kind === "http") {
    return { kind, clientIdentifier, headerOrder };
  }
  return { kind, clientIdentifier, headerOrder, fingerprint: options.fingerprint ?? {} };
}

/**
 * Deep copy, used when a reset rebuilds the engine
 */
export function copyEngineConfig(config: EngineConfig): EngineConfig {
  if (config.kind === "http") {
    return { ...config, headerOrder: [...config.headerOrder] };
  }
  const { headerGeneratorOptions, ...fingerprint } = config.fingerprint;
  return {
    ...config,
    headerOrder: [...config.headerOrder],
    fingerprint: headerGeneratorOptions
      ? { ...fingerprint, headerGeneratorOptions: structuredClone(headerGeneratorOptions) }
      : { ...fingerprint },
  };
}
