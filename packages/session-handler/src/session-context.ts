import {
  BadRequestApiError,
  ForbiddenApiError,
  isApiError,
  UnauthorizedApiError,
  UserChangedApiError,
  UserRequiredApiError,
  type OriginValidatorPort,
  type SessionData,
  type SessionStorePort,
  type SessionToken,
  type SignInInfo,
  type TokenEnvelopeCodec,
} from "@sessionguard/contracts";
import { describeError, runWithSpan } from "@sessionguard/telemetry";

import { mergeAccessOptions, type SessionAccessOptions } from "./access-options.js";
import { resolveDevice } from "./device.js";
import type { SessionHandlingOptions } from "./options.js";
import { isTokenStale, refreshSession, type RefreshResult } from "./refresh.js";
import type { CookieAttributes, SessionRequest, SessionResponse } from "./request.js";
import type { SessionTelemetryContext } from "./telemetry.js";

const ORIGIN_HEADER = "origin";
const USER_AGENT_HEADER = "user-agent";

const BASE_COOKIE_ATTRIBUTES: CookieAttributes = {
  httpOnly: true,
  secure: true,
  sameSite: "None",
  path: "/",
};

const CLEARED_COOKIE_ATTRIBUTES: CookieAttributes = {
  ...BASE_COOKIE_ATTRIBUTES,
  maxAgeSeconds: 0,
  expires: new Date(0),
};

export interface SessionContextDependencies<TToken extends SessionToken, TData extends SessionData> {
  readonly request: SessionRequest;
  readonly response: SessionResponse;
  readonly codec: TokenEnvelopeCodec<TToken>;
  readonly originValidator: OriginValidatorPort;
  readonly store: SessionStorePort<TToken, TData>;
  readonly options: SessionHandlingOptions;
  readonly telemetry: SessionTelemetryContext;
  readonly now: () => Date;
}

export type CreateSession<TToken extends SessionToken> = (signInInfo: SignInInfo) => Promise<TToken>;

/**
 * Session access for a single request. Reads the session cookie, enforces the
 * origin and user ID preconditions, refreshes stale tokens through the store
 * and writes the cookie back. Holds no state beyond the request.
 */
export class SessionContext<TToken extends SessionToken, TData extends SessionData> {
  private readonly request: SessionRequest;
  private readonly response: SessionResponse;
  private readonly codec: TokenEnvelopeCodec<TToken>;
  private readonly originValidator: OriginValidatorPort;
  private readonly store: SessionStorePort<TToken, TData>;
  private readonly options: SessionHandlingOptions;
  private readonly telemetry: SessionTelemetryContext;
  private readonly now: () => Date;
  private cachedDevice?: string;

  constructor(dependencies: SessionContextDependencies<TToken, TData>) {
    this.request = dependencies.request;
    this.response = dependencies.response;
    this.codec = dependencies.codec;
    this.originValidator = dependencies.originValidator;
    this.store = dependencies.store;
    this.options = dependencies.options;
    this.telemetry = dependencies.telemetry;
    this.now = dependencies.now;
  }

  /** Device label from the User-Agent header. Throws `BadRequestApiError` when it is missing or empty. */
  get device(): string {
    if (this.cachedDevice === undefined) {
      this.cachedDevice = resolveDevice(this.request.headerValues(USER_AGENT_HEADER));
    }
    return this.cachedDevice;
  }

  get ipAddress(): string | null {
    return this.request.ipAddress;
  }

  /**
   * `true` when the request carries no Origin header or a trusted one. More
   * than one Origin header is always a bad request.
   */
  isRequestOriginAllowed(): boolean {
    const origins = this.request.headerValues(ORIGIN_HEADER);
    if (origins.length === 0) {
      return true;
    }
    if (origins.length > 1) {
      throw new BadRequestApiError("Request contains multiple 'Origin' headers.");
    }
    return this.originValidator.isAllowed(origins[0]);
  }

  async getToken(accessOptions?: SessionAccessOptions): Promise<TToken | null> {
    const access = mergeAccessOptions(accessOptions, this.options.forcedAccessOptions);

    if (!this.isRequestOriginAllowed() && !access.allowAllOrigins) {
      throw new ForbiddenApiError("Cross-origin request was blocked.");
    }

    const envelope = this.request.cookie(this.options.cookieName);
    if (envelope === undefined) {
      return null;
    }

    const decoded = this.codec.decode(envelope);
    if (!decoded.ok) {
      this.telemetry.metrics.envelopeRejectionCounter.add(1, { code: decoded.error.code });
      this.telemetry.logger.warn("session.envelope.rejected", { code: decoded.error.code });
      this.clearToken();
      return null;
    }

    const token = decoded.value;
    this.validateUserIdPrecondition(token, access.optionalUserIdPrecondition);

    if (!access.forceRefresh && !isTokenStale(token, this.now())) {
      return token;
    }

    const refreshed = await this.refresh(token);
    if (!refreshed) {
      this.clearToken();
      return null;
    }

    this.setToken(refreshed);
    return refreshed;
  }

  async getRequiredToken(accessOptions?: SessionAccessOptions): Promise<TToken> {
    const token = await this.getToken(accessOptions);
    if (!token) {
      throw new UnauthorizedApiError("User is not signed in.");
    }
    return token;
  }

  /**
   * Starts a session. `createSession` persists the record described by the
   * sign-in info and returns its first token, which is written to the cookie.
   */
  async signIn(persistent: boolean, createSession: CreateSession<TToken>): Promise<TToken> {
    const signInInfo: SignInInfo = {
      device: this.device,
      ipAddress: this.ipAddress,
      sessionExpirySeconds: persistent
        ? this.options.persistentSessionExpirySeconds
        : this.options.tempSessionExpirySeconds,
      isPersistent: persistent,
    };

    const token = await createSession(signInInfo);
    this.request.signal?.throwIfAborted();

    this.setToken(token);
    this.telemetry.metrics.signInCounter.add(1, { persistent });
    this.telemetry.logger.info("session.signed_in", { userId: token.userId, persistent });
    return token;
  }

  /** Invalidates the current session, if any. Resolves `true` when one was ended. */
  async signOut(accessOptions?: SessionAccessOptions): Promise<boolean> {
    const token = await this.getToken(accessOptions);
    if (!token) {
      return false;
    }

    await this.store.invalidateSession(token, { signal: this.request.signal });
    this.request.signal?.throwIfAborted();

    this.clearToken();
    this.telemetry.metrics.signOutCounter.add(1);
    this.telemetry.logger.info("session.signed_out", { userId: token.userId });
    return true;
  }

  setToken(token: TToken): void {
    const attributes: CookieAttributes = token.isPersistent
      ? {
          ...BASE_COOKIE_ATTRIBUTES,
          maxAgeSeconds: token.validForSeconds,
          expires: new Date(this.now().getTime() + token.validForSeconds * 1000),
        }
      : BASE_COOKIE_ATTRIBUTES;

    this.response.setCookie(this.options.cookieName, this.codec.encode(token), attributes);
  }

  clearToken(): void {
    this.response.deleteCookie(this.options.cookieName, CLEARED_COOKIE_ATTRIBUTES);
  }

  private validateUserIdPrecondition(token: TToken, optional: boolean): void {
    const precondition = this.options.userIdPrecondition;
    if (!precondition) {
      return;
    }

    const { name, source } = precondition;
    const values = source === "header" ? this.request.headerValues(name) : this.request.queryValues(name);
    const label = source === "header" ? `'${name}' header` : `'${name}' query parameter`;

    if (values.length === 0) {
      if (optional) {
        return;
      }
      throw new UserRequiredApiError(`Request is missing required ${label} precondition.`);
    }

    if (values.length > 1) {
      throw new BadRequestApiError(`Request contains multiple ${label} values.`);
    }

    const userId = values[0];
    if (userId.length === 0) {
      throw new BadRequestApiError(`Empty user ID in ${label}.`);
    }

    if (userId !== token.userId) {
      throw new UserChangedApiError(`Request user identified in ${label} does not match session user.`);
    }
  }

  private async refresh(token: TToken): Promise<TToken | null> {
    const { tracer, logger, metrics } = this.telemetry;
    const signal = this.request.signal;

    let result: RefreshResult<TToken>;
    try {
      result = await runWithSpan(
        tracer,
        "session.refresh",
        async (span) => {
          const outcome = await refreshSession(token, {
            store: this.store,
            policy: this.options,
            device: () => this.device,
            ipAddress: this.ipAddress,
            now: this.now,
            signal,
          });
          span.setAttribute("session.refresh.status", outcome.status);
          return outcome;
        },
        { attributes: { "session.generation": token.generation } },
      );
    } catch (error) {
      // Aborts and malformed requests surface; store failures end the session for this request.
      signal?.throwIfAborted();
      if (isApiError(error)) {
        throw error;
      }
      metrics.refreshCounter.add(1, { outcome: "error" });
      logger.error("session.refresh.failed", { userId: token.userId, error: describeError(error) });
      return null;
    }

    signal?.throwIfAborted();

    if (result.status === "rejected") {
      metrics.refreshCounter.add(1, { outcome: result.reason });
      logger.warn("session.refresh.rejected", {
        userId: token.userId,
        reason: result.reason,
        invalidated: result.invalidated,
      });
      return null;
    }

    metrics.refreshCounter.add(1, { outcome: result.outcome });
    logger.debug("session.refreshed", {
      userId: token.userId,
      outcome: result.outcome,
      generation: result.token.generation,
    });
    return result.token;
  }
}
