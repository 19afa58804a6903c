import type { SessionData, SessionToken } from "../../types/session.js";

export interface SessionStoreOperationOptions {
  readonly signal?: AbortSignal;
}

/**
 * Version a record was loaded at. `updateSession` applies only while the stored
 * record still carries this generation and refresh timestamp.
 */
export interface SessionVersion {
  readonly generation: number;
  readonly refreshedAt: string;
}

export type SessionUpdateResult<TData extends SessionData> =
  | { readonly applied: true; readonly data: TData }
  | { readonly applied: false };

export interface SessionStorePort<TToken extends SessionToken, TData extends SessionData> {
  getSessionData(token: TToken, options?: SessionStoreOperationOptions): Promise<TData | undefined>;
  updateSession(
    data: TData,
    expected: SessionVersion,
    options?: SessionStoreOperationOptions,
  ): Promise<SessionUpdateResult<TData>>;
  invalidateSession(token: TToken, options?: SessionStoreOperationOptions): Promise<void>;
  /** Mints the token for `previousToken`'s session from the store's current refresh state. */
  refreshToken(previousToken: TToken, refreshInfo: TData, options?: SessionStoreOperationOptions): Promise<TToken>;
}
