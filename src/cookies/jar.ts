import { cookieMatchesUrl, createCookie, epochSeconds, type Cookie } from "./cookie.js";

/**
 * Session cookie jar.
 *
 * Entries are identified by (name, domain, path) like a browser jar, but the
 * sync step replaces by name, so in practice a jar holds one live cookie per
 * name.
 */
export class CookieJar implements Iterable<Cookie> {
  private cookies: Cookie[] = [];

  constructor(cookies: Iterable<Cookie> = []) {
    for (const cookie of cookies) {
      this.set(cookie);
    }
  }

  get size(): number {
    return this.cookies.length;
  }

  [Symbol.iterator](): IterableIterator<Cookie> {
    return this.cookies[Symbol.iterator]();
  }

  list(): Cookie[] {
    return [...this.cookies];
  }

  /**
   * Most recently stored cookie with this name (optionally on this domain)
   */
  get(name: string, domain?: string): Cookie | undefined {
    for (let i = this.cookies.length - 1; i >= 0; i--) {
      const cookie = this.cookies[i];
      if (cookie.name === name && (domain === undefined || cookie.domain === domain)) {
        return cookie;
      }
    }
    return undefined;
  }

  has(name: string, domain?: string): boolean {
    return this.get(name, domain) !== undefined;
  }

  /**
   * Store a cookie, replacing any entry with the same name, domain and path
   */
  set(cookie: Cookie): void {
    const index = this.cookies.findIndex(
      (c) => c.name === cookie.name && c.domain === cookie.domain && c.path === cookie.path
    );
    if (index === -1) {
      this.cookies.push(cookie);
    } else {
      this.cookies[index] = cookie;
    }
  }

  /**
   * Store a plain name/value cookie
   */
  setValue(name: string, value: string, domain: string = ""): Cookie {
    const cookie = createCookie({ name, value, domain });
    this.set(cookie);
    return cookie;
  }

  /**
   * Store every name/value pair as a plain cookie
   */
  update(values: Record<string, string>): void {
    for (const [name, value] of Object.entries(values)) {
      this.setValue(name, value);
    }
  }

  /**
   * Remove every cookie with one of these names, on any domain unless one is given
   *
   * @returns Number of entries removed
   */
  delete(names: string | string[], domain?: string): number {
    const targets = new Set(typeof names === "string" ? [names] : names);
    const before = this.cookies.length;
    this.cookies = this.cookies.filter(
      (c) => !(targets.has(c.name) && (domain === undefined || c.domain === domain))
    );
    return before - this.cookies.length;
  }

  /**
   * Remove everything except the named cookies
   */
  clear(except: string | string[] = []): void {
    const keep = new Set(typeof except === "string" ? [except] : except);
    this.cookies = this.cookies.filter((c) => keep.has(c.name));
  }

  /**
   * name -> value, later entries win
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const cookie of this.cookies) {
      record[cookie.name] = cookie.value;
    }
    return record;
  }

  /**
   * Cookies that apply to a URL
   */
  matching(url: string | URL, now: number = Date.now()): Cookie[] {
    const parsed = typeof url === "string" ? new URL(url) : url;
    const nowSeconds = epochSeconds(now);
    return this.cookies.filter((c) => cookieMatchesUrl(c, parsed, nowSeconds));
  }

  /**
   * `Cookie` header value for a URL, with per-call cookies layered on top.
   * Returns undefined when there is nothing to send.
   */
  headerFor(url: string | URL, extra: Record<string, string> = {}, now: number = Date.now()): string | undefined {
    const values = new Map<string, string>();
    for (const cookie of this.matching(url, now)) {
      values.set(cookie.name, cookie.value);
    }
    for (const [name, value] of Object.entries(extra)) {
      values.set(name, value);
    }

    if (values.size === 0) {
      return undefined;
    }

    return Array.from(values, ([name, value]) => `${name}=${value}`).join("; ");
  }

  clone(): CookieJar {
    return new CookieJar(this.cookies.map((c) => ({ ...c, rest: { ...c.rest } })));
  }
}
