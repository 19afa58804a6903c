import { describe, expect, it, vi } from "vitest";

import { UserRequiredApiError, type IdentifiedSessionToken } from "@sessionguard/contracts";
import { createSessionContextFactory } from "@sessionguard/session-handler";
import { InMemorySessionStore } from "@sessionguard/session-memory";
import type { Logger } from "@sessionguard/telemetry";
import { createEncryptedEnvelopeCodec, identifiedSessionTokenSchema } from "@sessionguard/token-envelope";

import {
  createExpressApiErrorHandler,
  createExpressSessionMiddleware,
  toSessionRequest,
  toSessionResponse,
  type ExpressRequestLike,
  type ExpressResponseLike,
} from "./express.js";

const USER_AGENT = "Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0";

class FakeResponse implements ExpressResponseLike {
  statusCode = 200;
  headersSent = false;
  writableFinished = false;
  body: string | undefined;
  private readonly headers = new Map<string, string | string[]>();
  private readonly closeListeners: Array<() => void> = [];

  getHeader(name: string): string | string[] | undefined {
    return this.headers.get(name.toLowerCase());
  }

  setHeader(name: string, value: string | string[]): this {
    this.headers.set(name.toLowerCase(), value);
    return this;
  }

  end(body?: string): this {
    this.body = body;
    this.writableFinished = true;
    return this;
  }

  on(_event: "close", listener: () => void): this {
    this.closeListeners.push(listener);
    return this;
  }

  close(): void {
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

const createLoggerSpy = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

const createHarness = () => {
  const now = () => new Date("2026-03-01T12:00:00.000Z");
  let counter = 0;
  const store = new InMemorySessionStore({ now, idFactory: () => `session-${++counter}` });
  const factory = createSessionContextFactory({
    codec: createEncryptedEnvelopeCodec<IdentifiedSessionToken>({
      secret: "test-secret",
      schema: identifiedSessionTokenSchema,
    }),
    store,
    telemetry: { logger: createLoggerSpy() },
    now,
  });
  return { store, session: createExpressSessionMiddleware(factory) };
};

describe("toSessionRequest", () => {
  it("keeps duplicate headers from rawHeaders", () => {
    const request = toSessionRequest({
      headers: { origin: "https://a.example.com, https://b.example.com" },
      rawHeaders: ["Origin", "https://a.example.com", "origin", "https://b.example.com", "Host", "api.example.com"],
    });

    expect(request.headerValues("Origin")).toEqual(["https://a.example.com", "https://b.example.com"]);
    expect(request.headerValues("X-Missing")).toEqual([]);
  });

  it("falls back to the parsed header map", () => {
    const request = toSessionRequest({ headers: { "if-user-id": "user-1", "x-list": ["one", "two"] } });

    expect(request.headerValues("If-User-Id")).toEqual(["user-1"]);
    expect(request.headerValues("X-List")).toEqual(["one", "two"]);
  });

  it("reads string query values and ignores nested ones", () => {
    const request = toSessionRequest({
      headers: {},
      query: { userId: ["user-1", "user-2"], single: "user-3", nested: { id: "user-4" } },
    });

    expect(request.queryValues("userId")).toEqual(["user-1", "user-2"]);
    expect(request.queryValues("single")).toEqual(["user-3"]);
    expect(request.queryValues("nested")).toEqual([]);
    expect(toSessionRequest({ headers: {} }).queryValues("userId")).toEqual([]);
  });

  it("parses cookies and resolves the client address", () => {
    const request = toSessionRequest({
      headers: { cookie: "theme=dark; session-token=abc%20def" },
      socket: { remoteAddress: "198.51.100.4" },
    });

    expect(request.cookie("session-token")).toBe("abc def");
    expect(request.cookie("missing")).toBeUndefined();
    expect(request.ipAddress).toBe("198.51.100.4");
    expect(toSessionRequest({ headers: {}, ip: "203.0.113.7" }).ipAddress).toBe("203.0.113.7");
    expect(toSessionRequest({ headers: {} }).ipAddress).toBeNull();
  });
});

describe("toSessionResponse", () => {
  it("replaces an earlier Set-Cookie for the same name and keeps others", () => {
    const res = new FakeResponse();
    res.setHeader("Set-Cookie", "theme=dark; Path=/; SameSite=Lax");
    const response = toSessionResponse(res);

    response.setCookie("session-token", "first", { path: "/", httpOnly: true, secure: true, sameSite: "None" });
    response.deleteCookie("session-token", {
      path: "/",
      httpOnly: true,
      secure: true,
      sameSite: "None",
      maxAgeSeconds: 0,
      expires: new Date(0),
    });

    expect(res.getHeader("Set-Cookie")).toEqual([
      "theme=dark; Path=/; SameSite=Lax",
      "session-token=; Path=/; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT; HttpOnly; Secure; SameSite=None",
    ]);
  });
});

describe("createExpressSessionMiddleware", () => {
  it("signs in and reads the session back from the cookie", async () => {
    const { store, session } = createHarness();
    const signInReq: ExpressRequestLike = { headers: { "user-agent": USER_AGENT }, ip: "203.0.113.7" };
    const signInRes = new FakeResponse();
    const next = vi.fn();

    session.middleware(signInReq, signInRes, next);
    expect(next).toHaveBeenCalledWith();

    const created = await session
      .getSessionContext(signInReq)
      .signIn(false, (info) => store.createSession("user-1", info));
    expect(created.sessionId).toBe("session-1");

    const setCookie = signInRes.getHeader("Set-Cookie");
    expect(Array.isArray(setCookie)).toBe(true);
    const header = Array.isArray(setCookie) ? setCookie[0] : "";
    expect(header.endsWith("; Path=/; HttpOnly; Secure; SameSite=None")).toBe(true);

    const cookie = header.slice(0, header.indexOf(";"));
    const nextReq: ExpressRequestLike = {
      headers: { "user-agent": USER_AGENT, cookie, "if-user-id": "user-1" },
      rawHeaders: ["User-Agent", USER_AGENT, "Cookie", cookie, "If-User-Id", "user-1"],
    };
    const nextRes = new FakeResponse();
    session.middleware(nextReq, nextRes, vi.fn());

    const token = await session.getSessionContext(nextReq).getToken();
    expect(token).toEqual(created);
    expect(nextRes.getHeader("Set-Cookie")).toBeUndefined();
  });

  it("throws when asked for a context the middleware never created", () => {
    const { session } = createHarness();

    expect(() => session.getSessionContext({ headers: {} })).toThrow(
      "Session middleware has not run for this request",
    );
  });

  it("aborts the session context when the connection closes early", async () => {
    const { store, session } = createHarness();
    const req: ExpressRequestLike = { headers: { "user-agent": USER_AGENT } };
    const res = new FakeResponse();
    session.middleware(req, res, vi.fn());

    res.close();

    await expect(
      session.getSessionContext(req).signIn(true, (info) => store.createSession("user-1", info)),
    ).rejects.toThrow("Request closed before the response finished");
    expect(res.getHeader("Set-Cookie")).toBeUndefined();
  });

  it("does not abort once the response has finished", async () => {
    const { store, session } = createHarness();
    const req: ExpressRequestLike = { headers: { "user-agent": USER_AGENT } };
    const res = new FakeResponse();
    session.middleware(req, res, vi.fn());

    res.end();
    res.close();

    const token = await session.getSessionContext(req).signIn(false, (info) => store.createSession("user-1", info));
    expect(token.userId).toBe("user-1");
  });
});

describe("createExpressApiErrorHandler", () => {
  it("writes api errors as plain text with their status", () => {
    const logger = createLoggerSpy();
    const handler = createExpressApiErrorHandler({ logger });
    const res = new FakeResponse();
    const next = vi.fn();

    handler(new UserRequiredApiError("Request is missing required 'If-User-Id' header precondition."), { headers: {} }, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(428);
    expect(res.getHeader("Content-Type")).toBe("text/plain; charset=utf-8");
    expect(res.body).toBe("Request is missing required 'If-User-Id' header precondition.");
    expect(logger.warn).toHaveBeenCalledWith("api.error.handled", {
      status: 428,
      code: "user_required",
      message: "Request is missing required 'If-User-Id' header precondition.",
    });
  });

  it("passes other errors along", () => {
    const handler = createExpressApiErrorHandler({ logger: createLoggerSpy() });
    const failure = new Error("boom");
    const next = vi.fn();

    handler(failure, { headers: {} }, new FakeResponse(), next);

    expect(next).toHaveBeenCalledWith(failure);
  });

  it("passes api errors along once headers are sent", () => {
    const handler = createExpressApiErrorHandler({ logger: createLoggerSpy() });
    const res = new FakeResponse();
    res.headersSent = true;
    const error = new UserRequiredApiError("Request is missing required 'If-User-Id' header precondition.");
    const next = vi.fn();

    handler(error, { headers: {} }, res, next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.statusCode).toBe(200);
  });
});
