import type { DomainError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { SessionToken } from "../../types/session.js";

export type EnvelopeErrorCode =
  | "envelope.invalid"
  | "envelope.authentication_failed"
  | "envelope.empty_payload";

export interface EnvelopeError extends DomainError {
  readonly code: EnvelopeErrorCode;
}

export interface TokenEnvelopeCodec<TToken extends SessionToken> {
  encode(token: TToken): string;
  decode(envelope: string): Result<TToken, EnvelopeError>;
}
