/**
 * Error taxonomy shared by every driver and the UI.
 *
 * Drivers translate whatever their client library throws into one of the two
 * runtime kinds below so that nothing above the driver layer branches on the
 * engine that produced it.
 */

export class TablewalkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The handle is unusable: network drop, auth failure, unreadable file. */
export class ConnectivityError extends TablewalkError {
  readonly kind = "connectivity" as const;
}

/** One statement failed; the handle is still usable. */
export class QueryError extends TablewalkError {
  readonly kind = "query" as const;

  constructor(
    /** Message as reported by the backend. */
    readonly backendMessage: string,
    options?: { cause?: unknown },
  ) {
    super(backendMessage, options);
  }
}

/** Raised while loading configuration, before the UI starts. */
export class ConfigError extends TablewalkError {
  readonly kind = "config" as const;
}

export type DbError = ConnectivityError | QueryError;

export type Result<T, E = DbError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function isDbError(e: unknown): e is DbError {
  return e instanceof ConnectivityError || e instanceof QueryError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** The `code` property drivers attach to their errors, if any. */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "EAI_AGAIN",
]);

export function isNetworkCode(code: string | undefined): boolean {
  return code !== undefined && NETWORK_CODES.has(code);
}
