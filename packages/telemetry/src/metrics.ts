import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type MetricOptions,
} from "@opentelemetry/api";

export interface InstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

export const DEFAULT_INSTRUMENTATION_NAME = "sessionguard";

export const getMeter = (options: InstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface InstrumentOptions extends MetricOptions {
  readonly instrumentation?: InstrumentationOptions;
}

export const createCounter = (name: string, options: InstrumentOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getMeter(instrumentation).createCounter(name, counterOptions);
};

export const createHistogram = (name: string, options: InstrumentOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getMeter(instrumentation).createHistogram(name, histogramOptions);
};
