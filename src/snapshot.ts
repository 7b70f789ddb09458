/**
 * Session snapshots: a session as a JSON document and back.
 *
 * Field names are snake_case and must not change; other programs read and
 * write the same documents.
 */

import { z } from "zod";
import type { Cookie } from "./cookies/cookie.js";
import { defaultEngineConfig } from "./engines/index.js";
import type { EngineName } from "./engines/types.js";
import { ErrorCode, ValidationError } from "./errors.js";
import type { HeaderProfile } from "./headers/profile.js";
import { Session, type SessionOptions } from "./session.js";

/**
 * Document tag for each engine kind
 */
export const SESSION_CLIENT_TYPES = {
  http: "HttpClient",
  tlsclient: "TLSClient",
} as const satisfies Record<EngineName, string>;

const ENGINE_BY_CLIENT_TYPE: Record<SessionClientType, EngineName> = {
  HttpClient: "http",
  TLSClient: "tlsclient",
};

export type SessionClientType = (typeof SESSION_CLIENT_TYPES)[EngineName];

export const cookieDocumentSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().default(""),
  path: z.string().default("/"),
  expires: z.number().nullable().default(null),
  secure: z.boolean().default(false),
  rest: z.record(z.string().nullable()).default({}),
  version: z.number().int().default(0),
  port: z.string().nullable().default(null),
  port_specified: z.boolean().default(false),
  domain_specified: z.boolean().default(false),
  domain_initial_dot: z.boolean().default(false),
  path_specified: z.boolean().default(true),
  discard: z.boolean().default(true),
  comment: z.string().nullable().default(null),
  comment_url: z.string().nullable().default(null),
  rfc2109: z.boolean().default(false),
});

export const sessionDocumentSchema = z.object({
  sessionClientType: z.enum(["HttpClient", "TLSClient"]),
  client_identifier: z.string().optional(),
  headers: z.record(z.string()).default({}),
  cookies: z.array(cookieDocumentSchema).default([]),
  proxies: z
    .object({
      http: z.string().optional(),
      https: z.string().optional(),
    })
    .default({}),
  header_helper: z.string(),
  no_middleware: z.boolean().default(false),
  use_mitm_when_active: z.boolean().default(false),
});

export type CookieDocument = z.infer<typeof cookieDocumentSchema>;
export type SessionDocument = z.infer<typeof sessionDocumentSchema>;

export function cookieToDocument(cookie: Cookie): CookieDocument {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    secure: cookie.secure,
    rest: { ...cookie.rest },
    version: cookie.version,
    port: cookie.port,
    port_specified: cookie.portSpecified,
    domain_specified: cookie.domainSpecified,
    domain_initial_dot: cookie.domainInitialDot,
    path_specified: cookie.pathSpecified,
    discard: cookie.discard,
    comment: cookie.comment,
    comment_url: cookie.commentUrl,
    rfc2109: cookie.rfc2109,
  };
}

export function cookieFromDocument(document: CookieDocument): Cookie {
  return {
    name: document.name,
    value: document.value,
    domain: document.domain,
    path: document.path,
    expires: document.expires,
    secure: document.secure,
    rest: { ...document.rest },
    version: document.version,
    port: document.port,
    portSpecified: document.port_specified,
    domainSpecified: document.domain_specified,
    domainInitialDot: document.domain_initial_dot,
    pathSpecified: document.path_specified,
    discard: document.discard,
    comment: document.comment,
    commentUrl: document.comment_url,
    rfc2109: document.rfc2109,
  };
}

/**
 * Validate a document (object or JSON text)
 *
 * @throws ValidationError naming the first offending field
 */
export function parseDocument(input: unknown): SessionDocument {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new ValidationError("Session document is not valid JSON", {
        code: ErrorCode.INVALID_DOCUMENT,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  const result = sessionDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw new ValidationError(`Invalid session document: ${field ? `${field}: ` : ""}${issue?.message ?? "unknown error"}`, {
      field,
      code: ErrorCode.INVALID_DOCUMENT,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Everything needed to rebuild the session elsewhere
 */
export function toDocument(session: Session): SessionDocument {
  const { config } = session.engine;
  return {
    sessionClientType: SESSION_CLIENT_TYPES[config.kind],
    client_identifier: config.clientIdentifier,
    headers: session.headers.toRecord(),
    cookies: session.cookies.list().map(cookieToDocument),
    proxies: session.proxies,
    header_helper: session.headerProfile.id,
    no_middleware: session.defaults.bypassMiddleware,
    use_mitm_when_active: session.defaults.useMitmWhenActive,
  };
}

/**
 * Rebuild a session: same engine kind and profile, headers replaced
 * wholesale, proxies and every cookie attribute restored
 *
 * @param options - Anything not stored in the document (logger, engine factory, ...)
 */
export function fromDocument(
  input: unknown,
  headerProfile: HeaderProfile,
  options: Omit<SessionOptions, "engine" | "headerProfile" | "headers" | "proxies"> = {}
): Session {
  const document = parseDocument(input);
  const kind = ENGINE_BY_CLIENT_TYPE[document.sessionClientType];

  const session = new Session({
    ...options,
    engine: defaultEngineConfig(kind, {
      clientIdentifier: document.client_identifier,
      headerOrder: headerProfile.getHeaderOrder(),
    }),
    headerProfile,
    proxies: document.proxies,
    bypassMiddleware: document.no_middleware,
    useMitmWhenActive: document.use_mitm_when_active,
  });

  session.setHeaders(document.headers);
  for (const cookie of document.cookies) {
    session.cookies.set(cookieFromDocument(cookie));
  }

  return session;
}
