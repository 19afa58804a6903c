export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  readonly name?: string;
  readonly level?: LogLevel;
  readonly fields?: Record<string, unknown>;
  readonly clock?: () => Date;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LOG_LEVEL_PRIORITY, value);

/**
 * JSON-lines logger. Each entry is one `console` call so the host's log shipper
 * sees exactly one record per event.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const name = options.name ?? "sessionguard";
  const clock = options.clock ?? (() => new Date());
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: Record<string, unknown>): Logger => {
    const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      const line = JSON.stringify({
        timestamp: clock().toISOString(),
        level,
        message,
        ...contextFields,
        ...context,
      });

      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    };

    return {
      debug(message, context) {
        write("debug", message, context);
      },
      info(message, context) {
        write("info", message, context);
      },
      warn(message, context) {
        write("warn", message, context);
      },
      error(message, context) {
        write("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies Logger;
  };

  return createInstance(baseFields);
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
