import { newDb, type IMemoryDb } from "pg-mem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { IdentifiedSessionToken, SignInInfo } from "@sessionguard/contracts";
import { createSessionContextFactory, type SessionRequest, type SessionResponse } from "@sessionguard/session-handler";
import { createEncryptedEnvelopeCodec, identifiedSessionTokenSchema } from "@sessionguard/token-envelope";

import { createPgQueryExecutor } from "./executors/pg-query-executor.js";
import { loadSessionMigrations } from "./migrations/index.js";
import { PostgresSessionStore } from "./postgres-session-store.js";

const T0 = Date.parse("2026-03-01T12:00:00.000Z");
const CHROME_ON_WINDOWS =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

const signInInfo: SignInInfo = {
  device: "Windows (Chrome 126.0.0.0)",
  ipAddress: "203.0.113.7",
  sessionExpirySeconds: 86400,
  isPersistent: false,
};

interface PgMemPool {
  end(): Promise<void>;
}

describe("PostgresSessionStore", () => {
  let db: IMemoryDb;
  let pool: PgMemPool;
  let store: PostgresSessionStore;
  let current: number;
  const now = () => new Date(current);

  beforeEach(async () => {
    current = T0;
    db = newDb();
    for (const migration of await loadSessionMigrations()) {
      db.public.none(migration.sql);
    }
    const adapter = db.adapters.createPg();
    const pgPool = new adapter.Pool();
    pool = pgPool;
    let counter = 0;
    store = new PostgresSessionStore(createPgQueryExecutor(pgPool), {
      now,
      idFactory: () => `session-${++counter}`,
    });
  });

  afterEach(async () => {
    await pool.end();
  });

  it("creates a session and mints its first token", async () => {
    const token = await store.createSession("user-1", signInInfo);

    expect(token).toEqual({
      sessionId: "session-1",
      userId: "user-1",
      refreshedAt: "2026-03-01T12:00:00.000Z",
      refreshAfterSeconds: 300,
      validForSeconds: 86400,
      generation: 0,
      isPersistent: false,
    });
    expect(await store.getSessionData(token)).toEqual({
      id: "session-1",
      userId: "user-1",
      device: "Windows (Chrome 126.0.0.0)",
      ipAddress: "203.0.113.7",
      isPersistent: false,
      validForSeconds: 86400,
      generation: 0,
      refreshedAt: "2026-03-01T12:00:00.000Z",
      createdAt: "2026-03-01T12:00:00.000Z",
    });
  });

  it("writes to the table the bundled migration creates", async () => {
    await store.createSession("user-1", signInInfo);

    expect(db.public.many("SELECT id, user_id, generation FROM user_sessions")).toEqual([
      { id: "session-1", user_id: "user-1", generation: 0 },
    ]);
  });

  it("does not load a session for another user", async () => {
    const token = await store.createSession("user-1", signInInfo);

    expect(await store.getSessionData({ ...token, userId: "user-2" })).toBeUndefined();
  });

  it("applies an update only at the expected version", async () => {
    const token = await store.createSession("user-1", signInInfo);
    const loaded = await store.getSessionData(token);
    if (!loaded) {
      throw new Error("session missing");
    }
    const expected = { generation: loaded.generation, refreshedAt: loaded.refreshedAt };
    const next = { ...loaded, refreshedAt: "2026-03-01T12:05:00.000Z", generation: 1, ipAddress: "198.51.100.1" };

    const first = await store.updateSession(next, expected);
    const second = await store.updateSession({ ...next, generation: 2 }, expected);

    expect(first).toEqual({ applied: true, data: next });
    expect(second).toEqual({ applied: false });
    expect((await store.getSessionData(token))?.generation).toBe(1);
  });

  it("lists and invalidates sessions", async () => {
    const first = await store.createSession("user-1", signInInfo);
    current += 1000;
    await store.createSession("user-1", { ...signInInfo, isPersistent: true });
    const other = await store.createSession("user-2", signInInfo);

    expect((await store.listSessionsByUser("user-1")).map((record) => record.id)).toEqual(["session-1", "session-2"]);

    await store.invalidateSession(first);
    expect(await store.getSessionData(first)).toBeUndefined();
    expect(await store.invalidateUserSessions("user-1")).toBe(1);
    expect(await store.listSessionsByUser("user-1")).toEqual([]);
    expect(await store.getSessionData(other)).toBeDefined();
  });

  it("does not query once the request is aborted", async () => {
    const token = await store.createSession("user-1", signInInfo);
    const controller = new AbortController();
    controller.abort(new Error("client closed"));

    await expect(store.invalidateSession(token, { signal: controller.signal })).rejects.toThrow("client closed");
    expect(await store.getSessionData(token)).toBeDefined();
  });

  it("backs concurrent refreshes from the session handler", async () => {
    const codec = createEncryptedEnvelopeCodec<IdentifiedSessionToken>({
      secret: "test-secret",
      schema: identifiedSessionTokenSchema,
    });
    const factory = createSessionContextFactory({
      codec,
      store,
      trustedOrigins: [],
      options: { userIdPrecondition: null },
      now,
    });
    const response: SessionResponse = { setCookie: () => undefined, deleteCookie: () => undefined };
    const token = await store.createSession("user-1", signInInfo);
    const envelope = codec.encode(token);
    const request: SessionRequest = {
      headerValues: (name) => (name === "user-agent" ? [CHROME_ON_WINDOWS] : []),
      queryValues: () => [],
      cookie: (name) => (name === "session-token" ? envelope : undefined),
      ipAddress: "203.0.113.7",
    };
    current += 400_000;

    const [first, second] = await Promise.all([
      factory.create(request, response).getToken(),
      factory.create(request, response).getToken(),
    ]);

    expect(first?.generation).toBe(1);
    expect(second?.generation).toBe(1);
    expect(first?.refreshedAt).toBe("2026-03-01T12:06:40.000Z");
    expect((await store.getSessionData(token))?.generation).toBe(1);
  });
});
