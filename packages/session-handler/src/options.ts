import { z } from "zod";

// RFC 6265 cookie-name token characters.
const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export const userIdPreconditionSchema = z.object({
  name: z.string().min(1),
  source: z.enum(["header", "query"]).default("header"),
});

export const sessionAccessOptionsSchema = z
  .object({
    forceRefresh: z.boolean().optional(),
    optionalUserIdPrecondition: z.boolean().optional(),
    allowAllOrigins: z.boolean().optional(),
  })
  .strict();

export const DEFAULT_SESSION_HANDLING = {
  cookieName: "session-token",
  userIdPrecondition: { name: "If-User-Id", source: "header" },
  multipleRefreshGracePeriodSeconds: 10,
  tempSessionExpirySeconds: 60 * 60 * 24,
  persistentSessionExpirySeconds: 60 * 60 * 24 * 30,
} as const;

export const sessionHandlingOptionsSchema = z.object({
  cookieName: z
    .string()
    .regex(COOKIE_NAME_PATTERN, "cookieName must be a valid cookie name")
    .default(DEFAULT_SESSION_HANDLING.cookieName),
  /** `null` disables the precondition check. */
  userIdPrecondition: userIdPreconditionSchema.nullable().default({ ...DEFAULT_SESSION_HANDLING.userIdPrecondition }),
  forcedAccessOptions: sessionAccessOptionsSchema.default({}),
  multipleRefreshGracePeriodSeconds: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_SESSION_HANDLING.multipleRefreshGracePeriodSeconds),
  tempSessionExpirySeconds: z.number().int().positive().default(DEFAULT_SESSION_HANDLING.tempSessionExpirySeconds),
  persistentSessionExpirySeconds: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SESSION_HANDLING.persistentSessionExpirySeconds),
});

export type SessionHandlingOptionsInput = z.input<typeof sessionHandlingOptionsSchema>;
export type SessionHandlingOptions = z.output<typeof sessionHandlingOptionsSchema>;
export type UserIdPrecondition = z.output<typeof userIdPreconditionSchema>;

export class SessionOptionsError extends Error {
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string>) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "SessionOptionsError";
    this.issues = issues;
  }
}

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));

export const normalizeSessionHandlingOptions = (input: SessionHandlingOptionsInput = {}): SessionHandlingOptions => {
  const result = sessionHandlingOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new SessionOptionsError("Invalid session handling options", formatIssues(result.error));
  }
  return result.data;
};
