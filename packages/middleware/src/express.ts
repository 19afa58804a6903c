import { isApiError, type SessionData, type SessionToken } from "@sessionguard/contracts";
import {
  parseCookieHeader,
  serializeSetCookie,
  setCookieName,
  type CookieAttributes,
  type SessionContext,
  type SessionContextFactory,
  type SessionRequest,
  type SessionResponse,
} from "@sessionguard/session-handler";
import { createLogger, type Logger } from "@sessionguard/telemetry";

export interface ExpressRequestLike {
  headers: Record<string, string | string[] | undefined>;
  /** Name/value pairs as received, duplicates included. */
  rawHeaders?: ReadonlyArray<string>;
  query?: unknown;
  ip?: string;
  socket?: { readonly remoteAddress?: string };
}

export interface ExpressResponseLike {
  statusCode: number;
  headersSent?: boolean;
  writableFinished?: boolean;
  getHeader(name: string): number | string | string[] | undefined;
  setHeader(name: string, value: string | string[]): unknown;
  end(body?: string): unknown;
  on?(event: "close", listener: () => void): unknown;
}

export type ExpressNextFunction = (error?: unknown) => void;

const SET_COOKIE_HEADER = "Set-Cookie";

const headerValuesOf = (req: ExpressRequestLike, name: string): string[] => {
  const lowered = name.toLowerCase();
  if (req.rawHeaders) {
    const values: string[] = [];
    for (let index = 0; index + 1 < req.rawHeaders.length; index += 2) {
      if (req.rawHeaders[index].toLowerCase() === lowered) {
        values.push(req.rawHeaders[index + 1]);
      }
    }
    return values;
  }

  const value = req.headers[lowered];
  if (value === undefined) {
    return [];
  }
  return typeof value === "string" ? [value] : [...value];
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const queryValuesOf = (req: ExpressRequestLike, name: string): string[] => {
  if (!isRecord(req.query)) {
    return [];
  }
  const value = req.query[name];
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return [];
};

const firstHeader = (req: ExpressRequestLike, name: string): string | undefined => {
  const value = req.headers[name];
  return Array.isArray(value) ? value.join("; ") : value;
};

export const toSessionRequest = (req: ExpressRequestLike, signal?: AbortSignal): SessionRequest => {
  let cookies: Map<string, string> | undefined;
  return {
    headerValues: (name) => headerValuesOf(req, name),
    queryValues: (name) => queryValuesOf(req, name),
    cookie(name) {
      cookies ??= parseCookieHeader(firstHeader(req, "cookie"));
      return cookies.get(name);
    },
    ipAddress: req.ip ?? req.socket?.remoteAddress ?? null,
    signal,
  };
};

const existingSetCookies = (res: ExpressResponseLike): string[] => {
  const current = res.getHeader(SET_COOKIE_HEADER);
  if (current === undefined) {
    return [];
  }
  return Array.isArray(current) ? [...current] : [String(current)];
};

// A later write for the same cookie replaces the earlier one within a response.
const writeSetCookie = (res: ExpressResponseLike, name: string, value: string, attributes: CookieAttributes) => {
  const others = existingSetCookies(res).filter((header) => setCookieName(header) !== name);
  res.setHeader(SET_COOKIE_HEADER, [...others, serializeSetCookie(name, value, attributes)]);
};

export const toSessionResponse = (res: ExpressResponseLike): SessionResponse => ({
  setCookie(name, value, attributes) {
    writeSetCookie(res, name, value, attributes);
  },
  deleteCookie(name, attributes) {
    writeSetCookie(res, name, "", attributes);
  },
});

export interface ExpressSessionMiddleware<TToken extends SessionToken, TData extends SessionData> {
  readonly middleware: (req: ExpressRequestLike, res: ExpressResponseLike, next: ExpressNextFunction) => void;
  getSessionContext(req: ExpressRequestLike): SessionContext<TToken, TData>;
}

/**
 * Attaches a session context to every request. The context's abort signal
 * fires when the connection closes before the response has finished.
 */
export const createExpressSessionMiddleware = <TToken extends SessionToken, TData extends SessionData>(
  factory: SessionContextFactory<TToken, TData>,
): ExpressSessionMiddleware<TToken, TData> => {
  const contexts = new WeakMap<ExpressRequestLike, SessionContext<TToken, TData>>();

  return {
    middleware(req, res, next) {
      const controller = new AbortController();
      res.on?.("close", () => {
        if (!res.writableFinished) {
          controller.abort(new Error("Request closed before the response finished"));
        }
      });
      contexts.set(req, factory.create(toSessionRequest(req, controller.signal), toSessionResponse(res)));
      next();
    },
    getSessionContext(req) {
      const context = contexts.get(req);
      if (!context) {
        throw new Error("Session middleware has not run for this request");
      }
      return context;
    },
  };
};

export interface ExpressApiErrorHandlerOptions {
  readonly logger?: Logger;
}

/** Writes `ApiError`s as `text/plain` with their status. Anything else goes to `next`. */
export const createExpressApiErrorHandler = (options: ExpressApiErrorHandlerOptions = {}) => {
  const logger = options.logger ?? createLogger({ name: "middleware" });

  return (error: unknown, _req: ExpressRequestLike, res: ExpressResponseLike, next: ExpressNextFunction): void => {
    if (!isApiError(error) || res.headersSent) {
      next(error);
      return;
    }

    logger.warn("api.error.handled", { status: error.status, code: error.code, message: error.message });
    res.statusCode = error.status;
    res.setHeader("Content-Type", "text/plain; charset=utf-8");
    res.end(error.message);
  };
};
