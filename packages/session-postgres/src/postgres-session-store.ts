import { randomUUID } from "node:crypto";

import {
  DEFAULT_REFRESH_AFTER_SECONDS,
  toIdentifiedSessionToken,
  type IdentifiedSessionToken,
  type SessionRecord,
  type SessionStoreOperationOptions,
  type SessionStorePort,
  type SessionUpdateResult,
  type SessionVersion,
  type SignInInfo,
} from "@sessionguard/contracts";

import type { QueryExecutor } from "./executors/query-executor.js";

export interface PostgresSessionStoreOptions {
  readonly now?: () => Date;
  readonly idFactory?: () => string;
  readonly refreshAfterSeconds?: number;
}

// Kept a type alias: pg's QueryResultRow needs an implicit index signature.
type SessionRow = {
  readonly id: string;
  readonly user_id: string;
  readonly device: string;
  readonly ip_address: string | null;
  readonly is_persistent: boolean;
  readonly valid_for_seconds: number;
  readonly generation: number;
  readonly refreshed_at: Date | string;
  readonly created_at: Date | string;
};

const toIsoString = (value: Date | string): string =>
  (value instanceof Date ? value : new Date(value)).toISOString();

const toRecord = (row: SessionRow): SessionRecord => ({
  id: row.id,
  userId: row.user_id,
  device: row.device,
  ipAddress: row.ip_address,
  isPersistent: row.is_persistent,
  validForSeconds: Number(row.valid_for_seconds),
  generation: Number(row.generation),
  refreshedAt: toIsoString(row.refreshed_at),
  createdAt: toIsoString(row.created_at),
});

const throwIfAborted = (options: SessionStoreOperationOptions | undefined): void => {
  options?.signal?.throwIfAborted();
};

/**
 * Session records in Postgres. `updateSession` is a single conditional UPDATE
 * on `(generation, refreshed_at)`, so concurrent refreshes of one session
 * serialize on the row and only one of them applies.
 */
export class PostgresSessionStore implements SessionStorePort<IdentifiedSessionToken, SessionRecord> {
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly refreshAfterSeconds: number;

  constructor(
    private readonly executor: QueryExecutor,
    options: PostgresSessionStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.refreshAfterSeconds = options.refreshAfterSeconds ?? DEFAULT_REFRESH_AFTER_SECONDS;
  }

  async createSession(
    userId: string,
    signInInfo: SignInInfo,
    options?: SessionStoreOperationOptions,
  ): Promise<IdentifiedSessionToken> {
    throwIfAborted(options);
    const timestamp = this.now().toISOString();
    const { rows } = await this.executor.query<SessionRow>(
      `INSERT INTO user_sessions (
        id,
        user_id,
        device,
        ip_address,
        is_persistent,
        valid_for_seconds,
        generation,
        refreshed_at,
        created_at
      ) VALUES ($1,$2,$3,$4,$5,$6,0,$7,$8)
      RETURNING *`,
      [
        this.idFactory(),
        userId,
        signInInfo.device,
        signInInfo.ipAddress,
        signInInfo.isPersistent,
        signInInfo.sessionExpirySeconds,
        timestamp,
        timestamp,
      ],
    );

    return toIdentifiedSessionToken(toRecord(rows[0]), this.refreshAfterSeconds);
  }

  async getSessionData(
    token: IdentifiedSessionToken,
    options?: SessionStoreOperationOptions,
  ): Promise<SessionRecord | undefined> {
    throwIfAborted(options);
    const { rows } = await this.executor.query<SessionRow>(
      `SELECT * FROM user_sessions WHERE id = $1 AND user_id = $2 LIMIT 1`,
      [token.sessionId, token.userId],
    );

    return rows.length === 0 ? undefined : toRecord(rows[0]);
  }

  async updateSession(
    data: SessionRecord,
    expected: SessionVersion,
    options?: SessionStoreOperationOptions,
  ): Promise<SessionUpdateResult<SessionRecord>> {
    throwIfAborted(options);
    const { rows } = await this.executor.query<SessionRow>(
      `UPDATE user_sessions
        SET device = $4,
          ip_address = $5,
          is_persistent = $6,
          valid_for_seconds = $7,
          generation = $8,
          refreshed_at = $9
        WHERE id = $1 AND generation = $2 AND refreshed_at = $3::timestamptz
        RETURNING *`,
      [
        data.id,
        expected.generation,
        expected.refreshedAt,
        data.device,
        data.ipAddress,
        data.isPersistent,
        data.validForSeconds,
        data.generation,
        data.refreshedAt,
      ],
    );

    return rows.length === 0 ? { applied: false } : { applied: true, data: toRecord(rows[0]) };
  }

  async invalidateSession(token: IdentifiedSessionToken, options?: SessionStoreOperationOptions): Promise<void> {
    throwIfAborted(options);
    await this.executor.query(`DELETE FROM user_sessions WHERE id = $1 AND user_id = $2`, [
      token.sessionId,
      token.userId,
    ]);
  }

  async refreshToken(
    previousToken: IdentifiedSessionToken,
    refreshInfo: SessionRecord,
    options?: SessionStoreOperationOptions,
  ): Promise<IdentifiedSessionToken> {
    throwIfAborted(options);
    return toIdentifiedSessionToken({ ...refreshInfo, id: previousToken.sessionId }, this.refreshAfterSeconds);
  }

  async listSessionsByUser(userId: string, options?: SessionStoreOperationOptions): Promise<SessionRecord[]> {
    throwIfAborted(options);
    const { rows } = await this.executor.query<SessionRow>(
      `SELECT * FROM user_sessions WHERE user_id = $1 ORDER BY created_at ASC`,
      [userId],
    );

    return rows.map((row) => toRecord(row));
  }

  async invalidateUserSessions(userId: string, options?: SessionStoreOperationOptions): Promise<number> {
    throwIfAborted(options);
    const { rows } = await this.executor.query<{ id: string }>(
      `DELETE FROM user_sessions WHERE user_id = $1 RETURNING id`,
      [userId],
    );

    return rows.length;
  }
}

export const createPostgresSessionStore = (
  executor: QueryExecutor,
  options?: PostgresSessionStoreOptions,
): PostgresSessionStore => new PostgresSessionStore(executor, options);
