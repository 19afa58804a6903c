import type { EnvelopeError, Result, SessionToken, SignerPort, TokenEnvelopeCodec } from "@sessionguard/contracts";

import { decodeBase64, encodeBase64 } from "./base64.js";
import { envelopeError } from "./errors.js";
import type { TokenSchema } from "./schemas.js";
import { deserializeToken, serializeToken } from "./token-serializer.js";

const SEPARATOR = " ";

export interface SignedEnvelopeCodecOptions<TToken extends SessionToken> {
  readonly signer: SignerPort;
  readonly schema: TokenSchema<TToken>;
}

/** Readable-but-tamperproof envelope: `base64(payload) + " " + base64(mac)`. */
export class SignedEnvelopeCodec<TToken extends SessionToken> implements TokenEnvelopeCodec<TToken> {
  private readonly signer: SignerPort;
  private readonly schema: TokenSchema<TToken>;

  constructor(options: SignedEnvelopeCodecOptions<TToken>) {
    this.signer = options.signer;
    this.schema = options.schema;
  }

  encode(token: TToken): string {
    const payload = serializeToken(token, this.schema);
    return `${encodeBase64(payload)}${SEPARATOR}${encodeBase64(this.signer.sign(payload))}`;
  }

  decode(envelope: string): Result<TToken, EnvelopeError> {
    const parts = envelope.split(SEPARATOR);
    if (parts.length !== 2) {
      return envelopeError("envelope.invalid", "Envelope must have exactly two parts", { parts: parts.length });
    }

    const [encodedPayload, encodedSignature] = parts;
    const payload = decodeBase64(encodedPayload);
    const signature = decodeBase64(encodedSignature);
    if (!payload || !signature) {
      return envelopeError("envelope.invalid", "Envelope is not valid base64");
    }

    if (!this.signer.verify(payload, signature)) {
      return envelopeError("envelope.authentication_failed", "Envelope signature does not match");
    }

    return deserializeToken(payload, this.schema);
  }
}

export const createSignedEnvelopeCodec = <TToken extends SessionToken>(
  options: SignedEnvelopeCodecOptions<TToken>,
): TokenEnvelopeCodec<TToken> => new SignedEnvelopeCodec(options);
