export type SameSite = "Strict" | "Lax" | "None";

export interface CookieAttributes {
  readonly httpOnly: boolean;
  readonly secure: boolean;
  readonly sameSite: SameSite;
  readonly path: string;
  readonly maxAgeSeconds?: number;
  readonly expires?: Date;
}

/**
 * Inbound request as seen by the session context. Host adapters build one per
 * request; header and query lookups return every value sent under the name.
 */
export interface SessionRequest {
  /** Case-insensitive header lookup. */
  headerValues(name: string): ReadonlyArray<string>;
  queryValues(name: string): ReadonlyArray<string>;
  cookie(name: string): string | undefined;
  readonly ipAddress: string | null;
  /** Aborted when the client goes away. */
  readonly signal?: AbortSignal;
}

export interface SessionResponse {
  setCookie(name: string, value: string, attributes: CookieAttributes): void;
  deleteCookie(name: string, attributes: CookieAttributes): void;
}
