/**
 * Client-held session token. Serialized into the session cookie envelope, so
 * everything here is visible to the client once decrypted or decoded.
 */
export interface SessionToken {
  readonly userId: string;
  /** ISO-8601 UTC timestamp of the last refresh. */
  readonly refreshedAt: string;
  /** Seconds after `refreshedAt` when the token is due for a refresh. */
  readonly refreshAfterSeconds: number;
  /** Seconds after `refreshedAt` when the token can no longer be refreshed. */
  readonly validForSeconds: number;
  readonly generation: number;
  readonly isPersistent: boolean;
}

export interface SessionTokenRefreshInfo {
  readonly refreshedAt: string;
  readonly validForSeconds: number;
  readonly generation: number;
}

/**
 * Server-side session record. Its `generation` is authoritative: a presented
 * token must match it, or trail it by one inside the refresh grace period.
 */
export interface SessionData extends SessionTokenRefreshInfo {
  readonly device: string;
  readonly ipAddress: string | null;
  readonly isPersistent: boolean;
}

export interface SignInInfo {
  readonly device: string;
  readonly ipAddress: string | null;
  readonly sessionExpirySeconds: number;
  readonly isPersistent: boolean;
}

export interface IdentifiedSessionToken extends SessionToken {
  readonly sessionId: string;
}

export interface SessionRecord extends SessionData {
  readonly id: string;
  readonly userId: string;
  readonly createdAt: string;
}
