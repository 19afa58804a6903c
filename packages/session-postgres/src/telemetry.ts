import {
  createCounter,
  createHistogram,
  createLogger,
  getTracer,
  type InstrumentationOptions,
  type Logger,
  type Tracer,
} from "@sessionguard/telemetry";

export interface PostgresTelemetryMetrics {
  readonly queryCounter: ReturnType<typeof createCounter>;
  readonly queryDuration: ReturnType<typeof createHistogram>;
}

export interface PostgresTelemetryOptions {
  readonly instrumentation?: InstrumentationOptions;
  readonly tracer?: Tracer;
  readonly logger?: Logger;
  readonly metrics?: Partial<PostgresTelemetryMetrics>;
}

export interface PostgresTelemetryContext {
  readonly tracer: Tracer;
  readonly logger: Logger;
  readonly metrics: PostgresTelemetryMetrics;
  readonly instrumentation: InstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: InstrumentationOptions = { name: "session-postgres" };

export const createPostgresTelemetry = (options: PostgresTelemetryOptions = {}): PostgresTelemetryContext => {
  const instrumentation: InstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getTracer(instrumentation);
  const logger = options.logger ?? createLogger({ name: instrumentation.name ?? "session-postgres" });
  const metrics: PostgresTelemetryMetrics = {
    queryCounter:
      options.metrics?.queryCounter ??
      createCounter("postgres_queries_total", {
        description: "Count of Postgres queries executed.",
        instrumentation,
      }),
    queryDuration:
      options.metrics?.queryDuration ??
      createHistogram("postgres_query_duration_ms", {
        description: "Duration of Postgres queries.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies PostgresTelemetryContext;
};
