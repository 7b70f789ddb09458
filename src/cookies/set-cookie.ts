import { createCookie, epochSeconds, type Cookie } from "./cookie.js";

/**
 * Attribute names that never start a new cookie inside one header value
 */
const RESERVED_ATTRIBUTES = new Set([
  "expires",
  "path",
  "comment",
  "commenturl",
  "domain",
  "max-age",
  "secure",
  "httponly",
  "version",
  "samesite",
  "partitioned",
  "priority",
  "port",
  "discard",
]);

/**
 * Split a combined Set-Cookie value ("a=1; Path=/, b=2") into one string per
 * cookie. Commas inside Expires dates are not separators.
 */
export function splitSetCookieHeader(header: string): string[] {
  return header
    .split(/,(?=\s*[^;,=\s]+=)/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

interface CookieDraft {
  name: string;
  value: string;
  attributes: Map<string, string | null>;
}

/**
 * Break one cookie string into drafts. A `key=value` pair whose key is not a
 * reserved attribute starts a new cookie, so "a=1; b=2" yields two.
 */
function draftsOf(cookieString: string): CookieDraft[] {
  const drafts: CookieDraft[] = [];
  let current: CookieDraft | undefined;

  for (const rawPair of cookieString.split(";")) {
    const pair = rawPair.trim();
    if (!pair) continue;

    const eq = pair.indexOf("=");
    const key = (eq === -1 ? pair : pair.slice(0, eq)).trim();
    const value = eq === -1 ? null : unquote(pair.slice(eq + 1).trim());
    if (!key) continue;

    const lower = key.toLowerCase();
    if (RESERVED_ATTRIBUTES.has(lower)) {
      current?.attributes.set(lower, value);
      continue;
    }

    if (value === null) {
      // Unknown flag; keep it on the current cookie
      current?.attributes.set(key, null);
      continue;
    }

    current = { name: key, value, attributes: new Map() };
    drafts.push(current);
  }

  return drafts;
}

function parseExpires(attributes: Map<string, string | null>, nowSeconds: number): number | null {
  const maxAge = attributes.get("max-age");
  if (maxAge !== undefined && maxAge !== null && /^-?\d+$/.test(maxAge)) {
    return nowSeconds + parseInt(maxAge, 10);
  }

  const expires = attributes.get("expires");
  if (expires) {
    const parsed = Date.parse(expires);
    if (!Number.isNaN(parsed)) {
      return epochSeconds(parsed);
    }
  }

  return null;
}

function toCookie(draft: CookieDraft, requestHost: string, nowSeconds: number): Cookie {
  const { attributes } = draft;
  const domainAttr = attributes.get("domain");
  const pathAttr = attributes.get("path");
  const portAttr = attributes.get("port");
  const versionAttr = attributes.get("version");
  const expires = parseExpires(attributes, nowSeconds);

  const rest: Record<string, string | null> = {};
  if (attributes.has("httponly")) rest.HttpOnly = null;
  const sameSite = attributes.get("samesite");
  if (sameSite !== undefined) rest.SameSite = sameSite;
  if (attributes.has("partitioned")) rest.Partitioned = null;
  const priority = attributes.get("priority");
  if (priority !== undefined) rest.Priority = priority;
  for (const [key, value] of attributes) {
    if (!RESERVED_ATTRIBUTES.has(key)) rest[key] = value;
  }

  const domain = domainAttr ? domainAttr.toLowerCase() : requestHost;

  return createCookie({
    name: draft.name,
    value: draft.value,
    domain,
    domainSpecified: Boolean(domainAttr),
    domainInitialDot: domain.startsWith("."),
    path: pathAttr || "/",
    pathSpecified: Boolean(pathAttr),
    expires,
    secure: attributes.has("secure"),
    rest,
    version: versionAttr && /^\d+$/.test(versionAttr) ? parseInt(versionAttr, 10) : 0,
    port: portAttr ?? null,
    portSpecified: portAttr !== undefined,
    discard: attributes.has("discard") || expires === null,
    comment: attributes.get("comment") ?? null,
    commentUrl: attributes.get("commenturl") ?? null,
  });
}

/**
 * Parse a Set-Cookie value (one cookie, or several combined) into cookie
 * records. Cookies without a Domain attribute are host-only for `requestHost`.
 */
export function parseSetCookie(header: string, requestHost: string = "", now: number = Date.now()): Cookie[] {
  const nowSeconds = epochSeconds(now);
  return splitSetCookieHeader(header).flatMap((part) =>
    draftsOf(part).map((draft) => toCookie(draft, requestHost.toLowerCase(), nowSeconds))
  );
}
