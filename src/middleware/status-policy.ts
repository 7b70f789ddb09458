/**
 * Status policy: decides whether a response status fails the attempt.
 */

import {
  AntiBotBlockedError,
  HttpStatusError,
  NotFoundError,
  ReboundError,
  RequestError,
  UnauthorizedError,
} from "../errors.js";
import type { Response, StatusHandler } from "../types.js";

/**
 * Statuses accepted without being treated as redirects here; 421 is a
 * non-standard signal some targets send for valid pages
 */
export function isPassThroughStatus(status: number): boolean {
  return status === 421 || (status >= 300 && status < 400);
}

/**
 * Resolve silently or throw the classified error.
 *
 * Rules, first match wins:
 * 1. status in `statusesToSkip` passes
 * 2. a custom handler decides alone; its failures become RequestError
 * 3. 200 passes
 * 4. 421 and 3xx pass
 * 5. 403, 401, 404 map to their own errors
 * 6. anything else is an HttpStatusError carrying the status
 */
export async function evaluateStatus(
  response: Response,
  statusesToSkip: ReadonlySet<string> = new Set(),
  customHandler?: StatusHandler
): Promise<void> {
  const { status } = response;

  if (statusesToSkip.has(String(status))) {
    return;
  }

  if (customHandler) {
    try {
      await customHandler(response);
    } catch (error: unknown) {
      if (error instanceof ReboundError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RequestError(message, {
        url: response.requestUrl,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return;
  }

  if (status === 200 || isPassThroughStatus(status)) {
    return;
  }

  switch (status) {
    case 403:
      throw new AntiBotBlockedError(response);
    case 401:
      throw new UnauthorizedError(response);
    case 404:
      throw new NotFoundError(response);
    default:
      throw new HttpStatusError(status, { response });
  }
}
