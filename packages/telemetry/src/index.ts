export type { InstrumentationOptions, InstrumentOptions } from "./metrics.js";
export { DEFAULT_INSTRUMENTATION_NAME, getMeter, createCounter, createHistogram } from "./metrics.js";

export type { Logger, LoggerOptions, LogLevel } from "./logging.js";
export { createLogger, describeError, isLogLevel } from "./logging.js";

export type { RunWithSpanOptions, Span, Tracer } from "./tracing.js";
export { getTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
