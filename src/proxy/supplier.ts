import { readFile } from "node:fs/promises";
import type { Logger } from "../utils/logger.js";
import { formatRawProxy, redactProxyUrl } from "./config.js";

/**
 * Source of fresh proxies for rotation
 */
export interface ProxySupplier {
  /**
   * A proxy URL, or an empty string when none is available
   *
   * @param sourcePath - Supplier-specific source (a file path for FileProxySupplier)
   */
  getProxy(sourcePath?: string): string | Promise<string>;
}

/**
 * Reads `host:port[:username:password]` lines and hands out a random one
 */
export class FileProxySupplier implements ProxySupplier {
  constructor(private readonly defaultPath: string = "proxies.txt") {}

  async loadProxies(sourcePath?: string): Promise<string[]> {
    const content = await readFile(sourcePath || this.defaultPath, "utf-8");
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Every line formatted as a proxy URL, unusable lines dropped
   */
  async getAllProxies(sourcePath?: string): Promise<string[]> {
    const lines = await this.loadProxies(sourcePath);
    return lines.map(formatRawProxy).filter((proxy) => proxy.length > 0);
  }

  async getProxy(sourcePath?: string): Promise<string> {
    const lines = await this.loadProxies(sourcePath);
    if (lines.length === 0) {
      return "";
    }
    return formatRawProxy(lines[Math.floor(Math.random() * lines.length)]);
  }
}

/** Attempts acquireProxy makes before giving up */
export const PROXY_ACQUISITION_ATTEMPTS = 10;

/**
 * Ask the supplier for a proxy until it returns a non-empty one.
 *
 * An explicit proxy wins immediately. Supplier failures count as empty
 * attempts and are logged; after the budget the result is undefined.
 */
export async function acquireProxy(
  supplier: ProxySupplier | undefined,
  options: {
    explicit?: string;
    sourcePath?: string;
    attempts?: number;
    logger?: Logger;
  } = {}
): Promise<string | undefined> {
  if (options.explicit) {
    return options.explicit;
  }

  if (!supplier) {
    return undefined;
  }

  const attempts = options.attempts ?? PROXY_ACQUISITION_ATTEMPTS;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const proxy = await supplier.getProxy(options.sourcePath);
      if (proxy) {
        options.logger?.debug({ proxy: redactProxyUrl(proxy), attempt }, "Acquired proxy");
        return proxy;
      }
    } catch (error) {
      options.logger?.warn({ attempt, error: String(error) }, "Proxy supplier failed");
    }
  }

  options.logger?.warn({ attempts }, "No proxy acquired, leaving proxy unset");
  return undefined;
}
