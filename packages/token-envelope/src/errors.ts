import { err, type EnvelopeError, type EnvelopeErrorCode, type Result } from "@sessionguard/contracts";

export const envelopeError = (
  code: EnvelopeErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Result<never, EnvelopeError> => err({ code, message, details });
