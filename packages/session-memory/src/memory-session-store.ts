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

type IdFactory = () => string;

export interface InMemorySessionStoreOptions {
  readonly now?: () => Date;
  readonly idFactory?: IdFactory;
  readonly refreshAfterSeconds?: number;
  readonly initialSessions?: ReadonlyArray<SessionRecord>;
}

const defaultIdFactory: IdFactory = () => randomUUID();

const throwIfAborted = (options: SessionStoreOperationOptions | undefined): void => {
  options?.signal?.throwIfAborted();
};

const byCreatedAt = (left: SessionRecord, right: SessionRecord): number =>
  Date.parse(left.createdAt) - Date.parse(right.createdAt);

export class InMemorySessionStore implements SessionStorePort<IdentifiedSessionToken, SessionRecord> {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly now: () => Date;
  private readonly idFactory: IdFactory;
  private readonly refreshAfterSeconds: number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? defaultIdFactory;
    this.refreshAfterSeconds = options.refreshAfterSeconds ?? DEFAULT_REFRESH_AFTER_SECONDS;
    for (const session of options.initialSessions ?? []) {
      this.sessions.set(session.id, { ...session });
    }
  }

  async createSession(
    userId: string,
    signInInfo: SignInInfo,
    options?: SessionStoreOperationOptions,
  ): Promise<IdentifiedSessionToken> {
    throwIfAborted(options);
    const timestamp = this.now().toISOString();
    const record: SessionRecord = {
      id: this.idFactory(),
      userId,
      device: signInInfo.device,
      ipAddress: signInInfo.ipAddress,
      isPersistent: signInInfo.isPersistent,
      validForSeconds: signInInfo.sessionExpirySeconds,
      refreshedAt: timestamp,
      createdAt: timestamp,
      generation: 0,
    };
    this.sessions.set(record.id, record);
    return toIdentifiedSessionToken(record, this.refreshAfterSeconds);
  }

  async getSessionData(
    token: IdentifiedSessionToken,
    options?: SessionStoreOperationOptions,
  ): Promise<SessionRecord | undefined> {
    throwIfAborted(options);
    const record = this.sessions.get(token.sessionId);
    if (!record || record.userId !== token.userId) {
      return undefined;
    }
    return { ...record };
  }

  async updateSession(
    data: SessionRecord,
    expected: SessionVersion,
    options?: SessionStoreOperationOptions,
  ): Promise<SessionUpdateResult<SessionRecord>> {
    throwIfAborted(options);
    const current = this.sessions.get(data.id);
    if (!current || current.generation !== expected.generation || current.refreshedAt !== expected.refreshedAt) {
      return { applied: false };
    }

    const next: SessionRecord = {
      ...current,
      device: data.device,
      ipAddress: data.ipAddress,
      refreshedAt: data.refreshedAt,
      validForSeconds: data.validForSeconds,
      generation: data.generation,
      isPersistent: data.isPersistent,
    };
    this.sessions.set(next.id, next);
    return { applied: true, data: { ...next } };
  }

  async invalidateSession(token: IdentifiedSessionToken, options?: SessionStoreOperationOptions): Promise<void> {
    throwIfAborted(options);
    const record = this.sessions.get(token.sessionId);
    if (record && record.userId === token.userId) {
      this.sessions.delete(record.id);
    }
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
    return [...this.sessions.values()]
      .filter((record) => record.userId === userId)
      .sort(byCreatedAt)
      .map((record) => ({ ...record }));
  }

  /** Signs a user out everywhere. Resolves with the number of sessions removed. */
  async invalidateUserSessions(userId: string, options?: SessionStoreOperationOptions): Promise<number> {
    throwIfAborted(options);
    let removed = 0;
    for (const record of [...this.sessions.values()]) {
      if (record.userId === userId) {
        this.sessions.delete(record.id);
        removed += 1;
      }
    }
    return removed;
  }
}

export const createInMemorySessionStore = (options?: InMemorySessionStoreOptions): InMemorySessionStore =>
  new InMemorySessionStore(options);
