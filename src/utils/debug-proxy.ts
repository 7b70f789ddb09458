import { createConnection } from "node:net";

/**
 * Local debugging proxy (Charles, mitmproxy, ...) used when a call opts in
 * with `useMitmWhenActive` and does not verify TLS
 */
export interface DebugProxyAddress {
  host: string;
  port: number;
}

const DEFAULT_DEBUG_PROXY: DebugProxyAddress = { host: "127.0.0.1", port: 8888 };

/**
 * Address from REBOUND_DEBUG_PROXY ("host:port"), or 127.0.0.1:8888
 */
export function resolveDebugProxy(value: string | undefined = process.env.REBOUND_DEBUG_PROXY): DebugProxyAddress {
  if (!value) {
    return DEFAULT_DEBUG_PROXY;
  }

  const sep = value.lastIndexOf(":");
  const port = sep === -1 ? NaN : parseInt(value.slice(sep + 1), 10);
  if (sep <= 0 || Number.isNaN(port)) {
    return DEFAULT_DEBUG_PROXY;
  }

  return { host: value.slice(0, sep), port };
}

export function debugProxyUrl(address: DebugProxyAddress): string {
  return `http://${address.host}:${address.port}`;
}

/**
 * Check whether something accepts TCP connections on host:port
 */
export function isPortOpen(host: string, port: number, timeoutMs: number = 10): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ host, port });

    const finish = (open: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(open);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
  });
}

/**
 * Debugging proxy URL when one is listening, otherwise undefined
 */
export async function detectDebugProxy(address: DebugProxyAddress = resolveDebugProxy()): Promise<string | undefined> {
  return (await isPortOpen(address.host, address.port)) ? debugProxyUrl(address) : undefined;
}
