/**
 * Session factory
 *
 * @example
 * const session = await createSession({ engine: "tlsclient", proxyFilePath: "./proxies.txt" });
 * const saved = toDocument(session);
 * const restored = restoreSession(saved);
 */

import { ErrorCode, ValidationError } from "./errors.js";
import { DEFAULT_HEADER_PROFILES, type HeaderProfileRegistry } from "./headers/profile.js";
import { acquireProxy, FileProxySupplier } from "./proxy/supplier.js";
import { Session, type SessionOptions } from "./session.js";
import { fromDocument, parseDocument } from "./snapshot.js";
import { logger as defaultLogger } from "./utils/logger.js";

export interface CreateSessionOptions extends SessionOptions {
  /** Proxy list to draw the initial proxy from, and to rotate from later */
  proxyFilePath?: string;
}

/**
 * Build a session. An explicit `proxies` value wins over `proxyFilePath`.
 */
export async function createSession(options: CreateSessionOptions = {}): Promise<Session> {
  const { proxyFilePath, ...sessionOptions } = options;
  const logger = sessionOptions.logger ?? defaultLogger;
  const proxySupplier = sessionOptions.proxySupplier ?? new FileProxySupplier(proxyFilePath);

  let proxies = sessionOptions.proxies;
  if (!proxies && proxyFilePath) {
    proxies = await acquireProxy(proxySupplier, { sourcePath: proxyFilePath, logger });
  }

  return new Session({
    ...sessionOptions,
    proxySupplier,
    proxySourcePath: sessionOptions.proxySourcePath ?? proxyFilePath,
    proxies,
    logger,
  });
}

/**
 * Rebuild a session from a document, picking its header profile by id
 *
 * @throws ValidationError for malformed documents or unknown profiles
 */
export function restoreSession(
  input: unknown,
  registry: HeaderProfileRegistry = DEFAULT_HEADER_PROFILES,
  options: Parameters<typeof fromDocument>[2] = {}
): Session {
  const document = parseDocument(input);
  const profileId = document.header_helper;

  const makeProfile = Object.hasOwn(registry, profileId) ? registry[profileId] : undefined;
  if (!makeProfile) {
    throw new ValidationError(`Header profile "${profileId}" not found`, {
      field: "header_helper",
      code: ErrorCode.INVALID_DOCUMENT,
    });
  }

  return fromDocument(document, makeProfile(), options);
}
