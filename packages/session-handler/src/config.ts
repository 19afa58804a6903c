import { z } from "zod";

import { isLogLevel, type LogLevel } from "@sessionguard/telemetry";

import { accessOptionsFromFlags, FORCED_ACCESS_FLAGS, type ForcedAccessFlag } from "./access-options.js";
import {
  DEFAULT_SESSION_HANDLING,
  formatIssues,
  normalizeSessionHandlingOptions,
  SessionOptionsError,
  type SessionHandlingOptions,
  type SessionHandlingOptionsInput,
} from "./options.js";

const MIN_SECRET_LENGTH = 32;
const DISABLED_PRECONDITION = "none";

const splitList = (value: string | undefined): string[] =>
  value === undefined
    ? []
    : value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);

const isForcedAccessFlag = (value: string): value is ForcedAccessFlag => Object.hasOwn(FORCED_ACCESS_FLAGS, value);

const areForcedAccessFlags = (values: string[]): values is ForcedAccessFlag[] => values.every(isForcedAccessFlag);

export const SessionGuardEnvSchema = z.object({
  SESSION_SECRET: z.string().min(MIN_SECRET_LENGTH, `SESSION_SECRET must be at least ${MIN_SECRET_LENGTH} characters`),
  SESSION_PREVIOUS_SECRETS: z.string().optional().transform(splitList),
  SESSION_TRUSTED_ORIGINS: z.string().optional().transform(splitList),
  SESSION_COOKIE_NAME: z.string().optional(),
  SESSION_USER_ID_PRECONDITION: z.string().optional(),
  SESSION_USER_ID_PRECONDITION_SOURCE: z.enum(["header", "query"]).optional(),
  SESSION_FORCED_ACCESS: z
    .string()
    .optional()
    .transform(splitList)
    .refine(areForcedAccessFlags, {
      message: `SESSION_FORCED_ACCESS accepts ${Object.keys(FORCED_ACCESS_FLAGS).join(", ")}`,
    }),
  SESSION_REFRESH_GRACE_SECONDS: z.coerce.number().int().nonnegative().optional(),
  SESSION_TEMP_EXPIRY_SECONDS: z.coerce.number().int().positive().optional(),
  SESSION_PERSISTENT_EXPIRY_SECONDS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z
    .string()
    .default("info")
    .refine(isLogLevel, { message: "LOG_LEVEL must be one of debug, info, warn, error" }),
});

export type SessionGuardEnv = z.output<typeof SessionGuardEnvSchema>;

export interface SessionGuardConfig {
  readonly secret: string;
  readonly previousSecrets: ReadonlyArray<string>;
  readonly trustedOrigins: ReadonlyArray<string>;
  readonly handling: SessionHandlingOptions;
  readonly logLevel: LogLevel;
}

// Blank variables count as unset.
const presentValues = (env: Record<string, string | undefined>): Record<string, string> => {
  const values: Record<string, string> = {};
  for (const key of Object.keys(SessionGuardEnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      values[key] = value;
    }
  }
  return values;
};

const resolvePrecondition = (env: SessionGuardEnv): SessionHandlingOptionsInput["userIdPrecondition"] => {
  const name = env.SESSION_USER_ID_PRECONDITION;
  if (name?.toLowerCase() === DISABLED_PRECONDITION) {
    return null;
  }
  if (name === undefined && env.SESSION_USER_ID_PRECONDITION_SOURCE === undefined) {
    return undefined;
  }
  return {
    name: name ?? DEFAULT_SESSION_HANDLING.userIdPrecondition.name,
    source: env.SESSION_USER_ID_PRECONDITION_SOURCE ?? DEFAULT_SESSION_HANDLING.userIdPrecondition.source,
  };
};

export const loadSessionGuardConfig = (
  env: Record<string, string | undefined> = process.env,
): SessionGuardConfig => {
  const result = SessionGuardEnvSchema.safeParse(presentValues(env));
  if (!result.success) {
    throw new SessionOptionsError("Invalid session environment", formatIssues(result.error));
  }

  const parsed = result.data;
  const handling = normalizeSessionHandlingOptions({
    cookieName: parsed.SESSION_COOKIE_NAME,
    userIdPrecondition: resolvePrecondition(parsed),
    forcedAccessOptions: accessOptionsFromFlags(parsed.SESSION_FORCED_ACCESS),
    multipleRefreshGracePeriodSeconds: parsed.SESSION_REFRESH_GRACE_SECONDS,
    tempSessionExpirySeconds: parsed.SESSION_TEMP_EXPIRY_SECONDS,
    persistentSessionExpirySeconds: parsed.SESSION_PERSISTENT_EXPIRY_SECONDS,
  });

  return {
    secret: parsed.SESSION_SECRET,
    previousSecrets: parsed.SESSION_PREVIOUS_SECRETS,
    trustedOrigins: parsed.SESSION_TRUSTED_ORIGINS,
    handling,
    logLevel: parsed.LOG_LEVEL,
  };
};
