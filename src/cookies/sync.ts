import type { CookieScope, Response } from "../types.js";
import type { CookieJar } from "./jar.js";
import { parseSetCookie } from "./set-cookie.js";

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "";
  }
}

/**
 * Apply Set-Cookie header value(s) to a jar.
 *
 * Each cookie with a non-empty value replaces the existing entries for its
 * name (jar-wide under the "name" scope, same domain only under
 * "name-domain"); blank values are ignored rather than treated as deletions.
 *
 * @returns Names of the cookies that were stored, in order
 */
export function applySetCookieHeader(
  jar: CookieJar,
  header: string | string[] | undefined,
  requestUrl: string,
  scope: CookieScope = "name",
  now: number = Date.now()
): string[] {
  if (!header || header.length === 0) {
    return [];
  }

  const values = typeof header === "string" ? [header] : header;
  const host = hostnameOf(requestUrl);
  const stored: string[] = [];

  for (const value of values) {
    for (const cookie of parseSetCookie(value, host, now)) {
      if (!cookie.value) continue;

      if (scope === "name-domain") {
        jar.delete(cookie.name, cookie.domain);
      } else {
        jar.delete(cookie.name);
      }
      jar.set(cookie);
      stored.push(cookie.name);
    }
  }

  return stored;
}

/**
 * Sync a response's Set-Cookie headers into the jar
 */
export function applySetCookies(
  jar: CookieJar,
  response: Pick<Response, "headers" | "requestUrl">,
  scope: CookieScope = "name"
): string[] {
  return applySetCookieHeader(jar, response.headers["set-cookie"], response.requestUrl, scope);
}
