export { createCookie, cookieMatchesUrl, isExpired, epochSeconds, type Cookie } from "./cookie.js";
export { CookieJar } from "./jar.js";
export { parseSetCookie, splitSetCookieHeader } from "./set-cookie.js";
export { applySetCookies, applySetCookieHeader } from "./sync.js";
