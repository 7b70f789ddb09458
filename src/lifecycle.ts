/**
 * Session lifecycle: engine reset and proxy rotation.
 *
 * A reset never leaves two live transports behind one session: the
 * replacement engine is built first (it opens no sockets until used), then the
 * old one is closed, then the replacement is installed.
 */

import { copyEngineConfig } from "./engines/index.js";
import { ReboundError } from "./errors.js";
import { hasProxy, normalizeProxyInput, redactProxyUrl } from "./proxy/config.js";
import { acquireProxy } from "./proxy/supplier.js";
import type { Session } from "./session.js";
import { Transport } from "./transport.js";
import type { ProxyInput, ProxyMap } from "./types.js";

export interface ResetOptions {
  /** Proxy to use instead of rotating */
  proxies?: ProxyInput;
  /** Source handed to the proxy supplier */
  proxySourcePath?: string;
  /** Apply a proxy to the new engine at all (default: true) */
  useProxies?: boolean;
  /** Carry the cookie jar over (default: false) */
  preserveCookies?: boolean;
  /** Carry the current headers over instead of the profile baseline (default: false) */
  preserveHeaders?: boolean;
}

/**
 * Work out the proxy the session should use next.
 *
 * An explicit proxy wins. Otherwise rotation only happens when a proxy is
 * already configured. Rotation failures resolve to null (proxy unset).
 *
 * @throws ValidationError when the explicit proxy is malformed
 */
export async function resolveNextProxy(
  session: Session,
  explicit?: ProxyInput,
  proxySourcePath?: string
): Promise<ProxyMap | null> {
  const explicitProxies = normalizeProxyInput(explicit);
  if (explicitProxies) {
    return explicitProxies;
  }

  if (!hasProxy(session.proxies)) {
    return null;
  }

  const proxy = await acquireProxy(session.proxySupplier, {
    sourcePath: proxySourcePath ?? session.proxySourcePath,
    logger: session.logger,
  });
  if (!proxy) {
    return null;
  }

  try {
    return normalizeProxyInput(proxy);
  } catch (error: unknown) {
    if (!(error instanceof ReboundError)) {
      throw error;
    }
    session.logger.warn(`[lifecycle] Supplier returned an unusable proxy ${redactProxyUrl(proxy)}: ${error.message}`);
    return null;
  }
}

/**
 * Replace the session's engine with a fresh one built from the same config
 */
export async function resetSession(session: Session, options: ResetOptions = {}): Promise<void> {
  const useProxies = options.useProxies ?? true;
  const old = session.transport;

  const proxies = useProxies ? await resolveNextProxy(session, options.proxies, options.proxySourcePath) : null;

  const config = copyEngineConfig(old.engine.config);
  const engine = session.engineFactory(config);

  await old.close();

  const transport = new Transport({
    engine,
    headers: options.preserveHeaders ? old.headers : session.headerProfile.getHeaders(config.clientIdentifier),
    cookies: options.preserveCookies ? old.cookies.clone() : undefined,
    proxies: proxies ?? undefined,
    logger: session.logger,
  });

  session.replaceTransport(transport);
  session.logger.debug(
    `[lifecycle] Reset ${config.kind} engine (${config.clientIdentifier}), proxy ${proxies ? "set" : "unset"}`
  );
}

/**
 * Rotate the proxy on the live transport. Leaves no proxy when rotation fails.
 */
export async function rotateProxy(session: Session, explicit?: ProxyInput, proxySourcePath?: string): Promise<void> {
  const proxies = await resolveNextProxy(session, explicit, proxySourcePath);

  session.transport.clearProxies();
  if (proxies) {
    session.transport.setProxies(proxies);
  }
  await session.transport.releaseUnusedProxies();
}
