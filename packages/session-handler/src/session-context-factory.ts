import type {
  OriginValidatorPort,
  SessionData,
  SessionStorePort,
  SessionToken,
  TokenEnvelopeCodec,
} from "@sessionguard/contracts";

import { normalizeSessionHandlingOptions, type SessionHandlingOptions, type SessionHandlingOptionsInput } from "./options.js";
import { OriginValidator } from "./origin-validator.js";
import type { SessionRequest, SessionResponse } from "./request.js";
import { SessionContext } from "./session-context.js";
import { createSessionTelemetry, type SessionTelemetryContext, type SessionTelemetryOptions } from "./telemetry.js";

export interface SessionContextFactoryOptions<TToken extends SessionToken, TData extends SessionData> {
  readonly codec: TokenEnvelopeCodec<TToken>;
  readonly store: SessionStorePort<TToken, TData>;
  /** Used as-is when given; otherwise built from `trustedOrigins`. */
  readonly originValidator?: OriginValidatorPort;
  readonly trustedOrigins?: ReadonlyArray<string>;
  readonly options?: SessionHandlingOptionsInput;
  readonly telemetry?: SessionTelemetryOptions;
  readonly now?: () => Date;
}

export interface SessionContextFactory<TToken extends SessionToken, TData extends SessionData> {
  readonly options: SessionHandlingOptions;
  create(request: SessionRequest, response: SessionResponse): SessionContext<TToken, TData>;
}

export const createSessionContextFactory = <TToken extends SessionToken, TData extends SessionData>(
  factoryOptions: SessionContextFactoryOptions<TToken, TData>,
): SessionContextFactory<TToken, TData> => {
  const options = normalizeSessionHandlingOptions(factoryOptions.options);
  const originValidator = factoryOptions.originValidator ?? new OriginValidator(factoryOptions.trustedOrigins ?? []);
  const telemetry: SessionTelemetryContext = createSessionTelemetry(factoryOptions.telemetry);
  const now = factoryOptions.now ?? (() => new Date());

  return {
    options,
    create(request, response) {
      return new SessionContext({
        request,
        response,
        codec: factoryOptions.codec,
        originValidator,
        store: factoryOptions.store,
        options,
        telemetry,
        now,
      });
    },
  };
};
