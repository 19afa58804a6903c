import type { SessionData, SessionStorePort, SessionToken } from "@sessionguard/contracts";

export type RefreshOutcome = "advanced" | "extended" | "reused";

export type RefreshRejectionReason =
  | "token_expired"
  | "missing"
  | "expired"
  | "grace_elapsed"
  | "device_mismatch"
  | "generation_mismatch"
  | "conflict";

export type RefreshResult<TToken extends SessionToken> =
  | { readonly status: "refreshed"; readonly outcome: RefreshOutcome; readonly token: TToken }
  | { readonly status: "rejected"; readonly reason: RefreshRejectionReason; readonly invalidated: boolean };

export interface RefreshPolicy {
  readonly multipleRefreshGracePeriodSeconds: number;
  readonly tempSessionExpirySeconds: number;
  readonly persistentSessionExpirySeconds: number;
}

export interface RefreshContext<TToken extends SessionToken, TData extends SessionData> {
  readonly store: SessionStorePort<TToken, TData>;
  readonly policy: RefreshPolicy;
  /** Evaluated only when the record is touched; may throw for a malformed request. */
  readonly device: () => string;
  readonly ipAddress: string | null;
  readonly now: () => Date;
  readonly signal?: AbortSignal;
}

// A lost version check is retried once; the reload then sees the winner's write.
const MAX_UPDATE_ATTEMPTS = 2;

/** Seconds from `timestamp` to `now`; unparsable timestamps count as infinitely old. */
export const secondsSince = (timestamp: string, now: Date): number => {
  const parsed = Date.parse(timestamp);
  return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : (now.getTime() - parsed) / 1000;
};

export const isTokenStale = (token: SessionToken, now: Date): boolean =>
  secondsSince(token.refreshedAt, now) > token.refreshAfterSeconds;

export const isTokenExpired = (token: SessionToken, now: Date): boolean =>
  secondsSince(token.refreshedAt, now) > token.validForSeconds;

const rejected = <TToken extends SessionToken>(
  reason: RefreshRejectionReason,
  invalidated = false,
): RefreshResult<TToken> => ({ status: "rejected", reason, invalidated });

/**
 * Generation protocol between a presented token and its stored record.
 *
 * - Same generation: the record is stamped with this request's device, IP and
 *   time. The generation only advances once the grace period since the last
 *   refresh has passed, so a burst of requests holding the same token shares
 *   one bump.
 * - Record one ahead: a concurrent request already refreshed. The caller gets
 *   a token for the current record if it is inside the grace period on the
 *   same device and IP.
 * - Anything else invalidates the record.
 */
export const refreshSession = async <TToken extends SessionToken, TData extends SessionData>(
  token: TToken,
  context: RefreshContext<TToken, TData>,
): Promise<RefreshResult<TToken>> => {
  const { store, policy, signal } = context;

  if (isTokenExpired(token, context.now())) {
    return rejected("token_expired");
  }

  for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt += 1) {
    const data = await store.getSessionData(token, { signal });
    if (!data) {
      return rejected("missing");
    }

    const now = context.now();
    const sinceRefresh = secondsSince(data.refreshedAt, now);
    if (sinceRefresh > data.validForSeconds) {
      await store.invalidateSession(token, { signal });
      return rejected("expired", true);
    }

    if (data.generation === token.generation) {
      const advance = sinceRefresh > policy.multipleRefreshGracePeriodSeconds;
      const next: TData = {
        ...data,
        device: context.device(),
        ipAddress: context.ipAddress,
        refreshedAt: now.toISOString(),
        validForSeconds: data.isPersistent ? policy.persistentSessionExpirySeconds : policy.tempSessionExpirySeconds,
        generation: advance ? data.generation + 1 : data.generation,
      };

      const update = await store.updateSession(
        next,
        { generation: data.generation, refreshedAt: data.refreshedAt },
        { signal },
      );
      if (!update.applied) {
        continue;
      }

      const refreshed = await store.refreshToken(token, update.data, { signal });
      return { status: "refreshed", outcome: advance ? "advanced" : "extended", token: refreshed };
    }

    if (data.generation === token.generation + 1) {
      const reason: RefreshRejectionReason | undefined =
        sinceRefresh > policy.multipleRefreshGracePeriodSeconds
          ? "grace_elapsed"
          : data.device !== context.device() || data.ipAddress !== context.ipAddress
            ? "device_mismatch"
            : undefined;

      if (reason) {
        await store.invalidateSession(token, { signal });
        return rejected(reason, true);
      }

      const reused = await store.refreshToken(token, data, { signal });
      return { status: "refreshed", outcome: "reused", token: reused };
    }

    await store.invalidateSession(token, { signal });
    return rejected("generation_mismatch", true);
  }

  return rejected("conflict");
};
