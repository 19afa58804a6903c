import {
  createCounter,
  createLogger,
  getTracer,
  type InstrumentationOptions,
  type Logger,
  type Tracer,
} from "@sessionguard/telemetry";

export interface SessionTelemetryMetrics {
  readonly refreshCounter: ReturnType<typeof createCounter>;
  readonly envelopeRejectionCounter: ReturnType<typeof createCounter>;
  readonly signInCounter: ReturnType<typeof createCounter>;
  readonly signOutCounter: ReturnType<typeof createCounter>;
}

export interface SessionTelemetryOptions {
  readonly instrumentation?: InstrumentationOptions;
  readonly tracer?: Tracer;
  readonly logger?: Logger;
  readonly metrics?: Partial<SessionTelemetryMetrics>;
}

export interface SessionTelemetryContext {
  readonly tracer: Tracer;
  readonly logger: Logger;
  readonly metrics: SessionTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: InstrumentationOptions = { name: "session-handler" };

export const createSessionTelemetry = (options: SessionTelemetryOptions = {}): SessionTelemetryContext => {
  const instrumentation: InstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getTracer(instrumentation);
  const logger = options.logger ?? createLogger({ name: instrumentation.name ?? "session-handler" });
  const metrics: SessionTelemetryMetrics = {
    refreshCounter:
      options.metrics?.refreshCounter ??
      createCounter("session_refresh_total", {
        description: "Session refresh attempts by outcome.",
        instrumentation,
      }),
    envelopeRejectionCounter:
      options.metrics?.envelopeRejectionCounter ??
      createCounter("session_envelope_rejections_total", {
        description: "Session cookies that failed to decode.",
        instrumentation,
      }),
    signInCounter:
      options.metrics?.signInCounter ??
      createCounter("session_sign_ins_total", {
        description: "Sessions started.",
        instrumentation,
      }),
    signOutCounter:
      options.metrics?.signOutCounter ??
      createCounter("session_sign_outs_total", {
        description: "Sessions ended by sign-out.",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics } satisfies SessionTelemetryContext;
};
