import { vi } from "vitest";

import type { Logger } from "@sessionguard/telemetry";

import type { CookieAttributes, SessionRequest, SessionResponse } from "./request.js";

export interface FakeRequestInit {
  readonly headers?: Record<string, string | ReadonlyArray<string>>;
  readonly query?: Record<string, string | ReadonlyArray<string>>;
  readonly cookies?: Record<string, string>;
  readonly ipAddress?: string | null;
  readonly signal?: AbortSignal;
}

const toValues = (value: string | ReadonlyArray<string> | undefined): ReadonlyArray<string> =>
  value === undefined ? [] : typeof value === "string" ? [value] : value;

export const createFakeRequest = (init: FakeRequestInit = {}): SessionRequest => {
  const headers = new Map(Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value]));
  return {
    headerValues: (name) => toValues(headers.get(name.toLowerCase())),
    queryValues: (name) => toValues(init.query?.[name]),
    cookie: (name) => init.cookies?.[name],
    ipAddress: init.ipAddress === undefined ? "203.0.113.7" : init.ipAddress,
    signal: init.signal,
  };
};

export interface CookieWrite {
  readonly name: string;
  /** `null` for a deletion. */
  readonly value: string | null;
  readonly attributes: CookieAttributes;
}

export class RecordingResponse implements SessionResponse {
  readonly writes: CookieWrite[] = [];

  setCookie(name: string, value: string, attributes: CookieAttributes): void {
    this.writes.push({ name, value, attributes });
  }

  deleteCookie(name: string, attributes: CookieAttributes): void {
    this.writes.push({ name, value: null, attributes });
  }
}

export const createTestLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};
