import { ok, type EnvelopeError, type Result, type SessionToken } from "@sessionguard/contracts";

import { envelopeError } from "./errors.js";
import type { TokenSchema } from "./schemas.js";

const sortKeys = (value: object): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value).sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0)));

/**
 * Canonical token bytes: schema-validated, keys sorted, UTF-8 JSON. Unknown
 * fields are dropped so encode and decode agree on the token's shape.
 */
export const serializeToken = <TToken extends SessionToken>(token: TToken, schema: TokenSchema<TToken>): Buffer =>
  Buffer.from(JSON.stringify(sortKeys(schema.parse(token))), "utf8");

export const deserializeToken = <TToken extends SessionToken>(
  payload: Uint8Array,
  schema: TokenSchema<TToken>,
): Result<TToken, EnvelopeError> => {
  if (payload.length === 0) {
    return envelopeError("envelope.empty_payload", "Envelope payload is empty");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(payload).toString("utf8"));
  } catch {
    return envelopeError("envelope.invalid", "Envelope payload is not valid JSON");
  }

  if (parsed === null) {
    return envelopeError("envelope.empty_payload", "Envelope payload holds no token");
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return envelopeError("envelope.invalid", "Envelope payload is not a session token", {
      issues: result.error.issues.map((issue) => issue.path.join(".") || issue.message),
    });
  }

  return ok(result.data);
};
