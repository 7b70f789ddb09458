/**
 * Request Orchestrator
 *
 * Drives one logical call through the transport:
 *   1. send the request
 *   2. sync Set-Cookie into the jar (also on failing responses)
 *   3. run the status policy
 *   4. follow the redirect, or return
 *
 * Failed attempts are recorded and consume the retry budget. Redirect hops
 * do not; they have their own budget (`maxRedirects`).
 */

import { applySetCookies } from "../cookies/sync.js";
import { AggregateFailure, RedirectLimitError, wrapError, type AttemptError, type ReboundError } from "../errors.js";
import type { Transport } from "../transport.js";
import type { CallContext, HttpMethod, RequestOptions, Response } from "../types.js";
import { getHeader } from "../types.js";
import { normalizeOptions, type NormalizedOptions } from "./options.js";
import { evaluateStatus } from "./status-policy.js";

/**
 * Redirect announced by a response
 */
export interface RedirectTarget {
  /** Location header as sent */
  location: string;
  /** Location resolved against the URL that was fetched */
  url: string;
}

/**
 * 3xx with a non-empty Location header, otherwise null
 */
export function redirectTargetOf(response: Response): RedirectTarget | null {
  if (response.status < 300 || response.status > 399) {
    return null;
  }
  const location = getHeader(response, "location");
  if (!location) {
    return null;
  }
  return { location, url: new URL(location, response.requestUrl).toString() };
}

/**
 * Whether a stop predicate matches the target (raw or resolved)
 */
export function stopsAt(target: RedirectTarget, options: Pick<NormalizedOptions, "redirectStopExact" | "redirectStopContains">): boolean {
  const { redirectStopExact: exact, redirectStopContains: contains } = options;

  if (exact && (target.location === exact || target.url === exact)) {
    return true;
  }
  if (contains && (target.location.includes(contains) || target.url.includes(contains))) {
    return true;
  }
  return false;
}

type AttemptOutcome = { type: "response"; response: Response } | { type: "redirect"; target: RedirectTarget };

/**
 * One transport call plus cookie sync, status policy and redirect decision
 */
async function attemptOnce(
  transport: Transport,
  method: HttpMethod,
  url: string,
  options: NormalizedOptions,
  context: CallContext
): Promise<AttemptOutcome> {
  const response = await transport.request(method, url, options.call);

  applySetCookies(transport.cookies, response, context.defaults.cookieScope);

  const target = redirectTargetOf(response);

  if (!options.skipStatusCheck) {
    await evaluateStatus(response, options.statusesToSkip, options.customStatusHandler);
  }

  if (!target) {
    return { type: "response", response };
  }

  if (!options.skipRedirects && !stopsAt(target, options)) {
    return { type: "redirect", target };
  }

  // Not followed: the call ends at the redirect target
  return { type: "response", response: { ...response, url: target.url } };
}

function recordAttempt(attempts: AttemptError[], error: ReboundError, url: string): AttemptError {
  const record: AttemptError = {
    attempt: attempts.length + 1,
    kind: error.code,
    message: error.message,
    url,
    error,
  };
  attempts.push(record);
  return record;
}

/**
 * Execute a call with retries and redirect following.
 *
 * @returns The final response
 * @throws AggregateFailure when the retry or redirect budget runs out
 * @throws ValidationError for unusable options, before anything is sent
 *
 * @example
 * const response = await executeRequest(transport, "GET", "https://example.com", {
 *   maxRetries: 5,
 *   redirectStopContains: "/login",
 * }, { defaults: DEFAULT_SESSION_OPTIONS, logger });
 */
export async function executeRequest(
  transport: Transport,
  method: HttpMethod,
  url: string,
  options: RequestOptions,
  context: CallContext
): Promise<Response> {
  const normalized = normalizeOptions(options, context.defaults);
  const { logger } = context;

  if (normalized.bypassMiddleware) {
    logger.debug(`[orchestrator] ${method} ${url} (middleware bypassed)`);
    return transport.request(method, url, normalized.call);
  }

  const attempts: AttemptError[] = [];
  let current = url;
  let hops = 0;

  while (attempts.length < normalized.maxRetries) {
    logger.debug(`[orchestrator] ${method} ${current} (attempt ${attempts.length + 1}/${normalized.maxRetries})`);

    let outcome: AttemptOutcome;
    try {
      outcome = await attemptOnce(transport, method, current, normalized, context);
    } catch (error: unknown) {
      const record = recordAttempt(attempts, wrapError(error, current), current);
      logger.warn(
        `[orchestrator] Attempt ${record.attempt}/${normalized.maxRetries} failed for ${current}: [${record.kind}] ${record.message}`
      );
      continue;
    }

    if (outcome.type === "response") {
      logger.debug(`[orchestrator] ${method} ${current} -> ${outcome.response.status}`);
      return outcome.response;
    }

    hops++;
    if (hops > normalized.maxRedirects) {
      recordAttempt(attempts, new RedirectLimitError(normalized.maxRedirects, current), current);
      logger.warn(`[orchestrator] Redirect limit of ${normalized.maxRedirects} reached at ${current}`);
      throw new AggregateFailure(`Exceeded ${normalized.maxRedirects} redirects for ${method} ${url}`, attempts, url);
    }

    logger.debug(`[orchestrator] Redirect ${hops}: ${current} -> ${outcome.target.url}`);
    // Query parameters belong to the first hop only
    normalized.call = { ...normalized.call, params: undefined };
    current = outcome.target.url;
  }

  throw new AggregateFailure(
    `Request failed after ${attempts.length} attempts: ${method} ${url}`,
    attempts,
    url
  );
}
