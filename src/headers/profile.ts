/**
 * Header profiles
 *
 * A profile produces the baseline browser headers a session starts with and
 * gets back after a reset. Sessions persist only the profile's `id`; the
 * registry maps it back to an instance when a document is restored.
 */

/**
 * Header profile interface - all profiles must implement this
 */
export interface HeaderProfile {
  /** Identifier written to persisted documents */
  readonly id: string;

  /**
   * Baseline headers matching an engine's client identifier
   * (e.g. "chrome_120", or a bare major version such as "128")
   */
  getHeaders(clientIdentifier: string): Record<string, string>;

  /**
   * Header names in the order the emulated browser sends them
   */
  getHeaderOrder(): string[];
}

/**
 * Chrome header order for a top-level navigation
 */
const CHROME_HEADER_ORDER = [
  "Host",
  "Connection",
  "Cache-Control",
  "Sec-Ch-Ua",
  "Sec-Ch-Ua-Mobile",
  "Sec-Ch-Ua-Platform",
  "Upgrade-Insecure-Requests",
  "User-Agent",
  "Accept",
  "Sec-Fetch-Site",
  "Sec-Fetch-Mode",
  "Sec-Fetch-User",
  "Sec-Fetch-Dest",
  "Accept-Encoding",
  "Accept-Language",
  "Cookie",
];

/**
 * Platform strings used in the User-Agent and client hints
 */
const PLATFORMS = {
  Windows: { system: "Windows NT 10.0; Win64; x64", mobile: false },
  macOS: { system: "Macintosh; Intel Mac OS X 10_15_7", mobile: false },
  Linux: { system: "X11; Linux x86_64", mobile: false },
  Android: { system: "Linux; Android 10; K", mobile: true },
} as const;

export type ChromePlatform = keyof typeof PLATFORMS;

const DEFAULT_CHROME_VERSION = 120;

/**
 * Pull the Chrome major version out of a client identifier
 *
 * @example
 * chromeVersionOf("chrome_120") // 120
 * chromeVersionOf("chrome_117_psk") // 117
 * chromeVersionOf("128") // 128
 */
export function chromeVersionOf(clientIdentifier: string): number {
  const match = /(?:^|chrome_)(\d+)/.exec(clientIdentifier);
  if (!match) {
    return DEFAULT_CHROME_VERSION;
  }
  return parseInt(match[1], 10);
}

/**
 * Deterministic Chrome profile: the same identifier and platform always
 * produce the same headers
 */
export class ChromeHeaderProfile implements HeaderProfile {
  readonly id = "ChromeHeaderProfile";
  private readonly platform: ChromePlatform;
  private readonly acceptLanguage: string;

  constructor(options: { platform?: ChromePlatform; acceptLanguage?: string } = {}) {
    this.platform = options.platform ?? "Windows";
    this.acceptLanguage = options.acceptLanguage ?? "en-US,en;q=0.9";
  }

  getHeaders(clientIdentifier: string): Record<string, string> {
    const version = chromeVersionOf(clientIdentifier);
    const { system, mobile } = PLATFORMS[this.platform];
    const suffix = mobile ? "Mobile Safari" : "Safari";

    return {
      "Sec-Ch-Ua": `"Google Chrome";v="${version}", "Chromium";v="${version}", "Not)A;Brand";v="99"`,
      "Sec-Ch-Ua-Mobile": mobile ? "?1" : "?0",
      "Sec-Ch-Ua-Platform": `"${this.platform}"`,
      "Upgrade-Insecure-Requests": "1",
      "User-Agent": `Mozilla/5.0 (${system}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version}.0.0.0 ${suffix}/537.36`,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
      "Sec-Fetch-Site": "none",
      "Sec-Fetch-Mode": "navigate",
      "Sec-Fetch-User": "?1",
      "Sec-Fetch-Dest": "document",
      "Accept-Encoding": "gzip, deflate, br",
      "Accept-Language": this.acceptLanguage,
    };
  }

  getHeaderOrder(): string[] {
    return [...CHROME_HEADER_ORDER];
  }
}

/**
 * Profiles known to `restoreSession`, by id
 */
export type HeaderProfileRegistry = Record<string, () => HeaderProfile>;

export const DEFAULT_HEADER_PROFILES: HeaderProfileRegistry = {
  ChromeHeaderProfile: () => new ChromeHeaderProfile(),
};
