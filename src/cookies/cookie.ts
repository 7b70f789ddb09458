/**
 * Cookie records and URL matching.
 *
 * A record carries every attribute needed to persist and restore it exactly,
 * including the RFC 2109/2965 metadata most servers never send.
 */

export interface Cookie {
  name: string;
  value: string;
  /** Domain as stored; empty string matches every host */
  domain: string;
  path: string;
  /** Expiry as epoch seconds, null for a session cookie */
  expires: number | null;
  secure: boolean;
  /** Non-standard attributes (HttpOnly, SameSite, ...); flag attributes map to null */
  rest: Record<string, string | null>;
  version: number;
  port: string | null;
  portSpecified: boolean;
  domainSpecified: boolean;
  domainInitialDot: boolean;
  pathSpecified: boolean;
  discard: boolean;
  comment: string | null;
  commentUrl: string | null;
  rfc2109: boolean;
}

/**
 * Build a cookie record, filling unspecified attributes with the defaults a
 * plain name/value/domain cookie gets
 */
export function createCookie(
  init: Pick<Cookie, "name" | "value"> & Partial<Omit<Cookie, "name" | "value">>
): Cookie {
  const domain = init.domain ?? "";
  const path = init.path ?? "/";
  const expires = init.expires ?? null;

  return {
    name: init.name,
    value: init.value,
    domain,
    path,
    expires,
    secure: init.secure ?? false,
    rest: init.rest ?? { HttpOnly: null },
    version: init.version ?? 0,
    port: init.port ?? null,
    portSpecified: init.portSpecified ?? false,
    domainSpecified: init.domainSpecified ?? domain !== "",
    domainInitialDot: init.domainInitialDot ?? domain.startsWith("."),
    pathSpecified: init.pathSpecified ?? path !== "",
    discard: init.discard ?? expires === null,
    comment: init.comment ?? null,
    commentUrl: init.commentUrl ?? null,
    rfc2109: init.rfc2109 ?? false,
  };
}

/**
 * Current time as epoch seconds
 */
export function epochSeconds(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}

export function isExpired(cookie: Cookie, nowSeconds: number = epochSeconds()): boolean {
  return cookie.expires !== null && cookie.expires <= nowSeconds;
}

/**
 * Check whether a cookie should be sent to a URL: host/domain, path prefix,
 * secure flag and expiry.
 *
 * Domain matching keeps the dot boundary: `.example.com` must not match
 * `badexample.com`.
 */
export function cookieMatchesUrl(cookie: Cookie, url: URL, nowSeconds: number = epochSeconds()): boolean {
  if (isExpired(cookie, nowSeconds)) return false;

  if (cookie.secure && url.protocol !== "https:") return false;

  if (cookie.domain !== "") {
    const hostname = url.hostname.toLowerCase();
    const domain = (cookie.domain.startsWith(".") ? cookie.domain.slice(1) : cookie.domain).toLowerCase();

    if (cookie.domainSpecified) {
      if (hostname !== domain && !hostname.endsWith(`.${domain}`)) return false;
    } else if (hostname !== domain) {
      return false;
    }
  }

  const path = cookie.path || "/";
  if (!url.pathname.startsWith(path)) return false;

  return true;
}
