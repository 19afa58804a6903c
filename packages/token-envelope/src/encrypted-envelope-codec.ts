import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

import type { EnvelopeError, Result, SessionToken, TokenEnvelopeCodec } from "@sessionguard/contracts";

import { decodeBase64Url, encodeBase64Url } from "./base64.js";
import { envelopeError } from "./errors.js";
import { deriveKey } from "./key-derivation.js";
import type { TokenSchema } from "./schemas.js";
import { deserializeToken, serializeToken } from "./token-serializer.js";

const CIPHER = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export const DEFAULT_ENVELOPE_PURPOSE = "sessionguard.session-token.v1";

export interface EncryptedEnvelopeCodecOptions<TToken extends SessionToken> {
  readonly secret: string;
  /** Retired secrets still accepted when decoding. Never used to encode. */
  readonly previousSecrets?: ReadonlyArray<string>;
  readonly purpose?: string;
  readonly schema: TokenSchema<TToken>;
}

/**
 * AES-256-GCM envelope: `base64url(iv ‖ ciphertext ‖ tag)`. The purpose string
 * is bound as additional authenticated data, so an envelope minted for one
 * purpose never decodes under another.
 */
export class EncryptedEnvelopeCodec<TToken extends SessionToken> implements TokenEnvelopeCodec<TToken> {
  private readonly encryptionKey: Buffer;
  private readonly decryptionKeys: ReadonlyArray<Buffer>;
  private readonly additionalData: Buffer;
  private readonly schema: TokenSchema<TToken>;

  constructor(options: EncryptedEnvelopeCodecOptions<TToken>) {
    if (!options.secret || options.secret.length === 0) {
      throw new Error("EncryptedEnvelopeCodec requires a non-empty secret");
    }

    const purpose = options.purpose ?? DEFAULT_ENVELOPE_PURPOSE;
    this.encryptionKey = deriveKey(options.secret, purpose);
    this.decryptionKeys = [
      this.encryptionKey,
      ...(options.previousSecrets ?? []).map((secret) => deriveKey(secret, purpose)),
    ];
    this.additionalData = Buffer.from(purpose, "utf8");
    this.schema = options.schema;
  }

  encode(token: TToken): string {
    const plaintext = serializeToken(token, this.schema);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(CIPHER, this.encryptionKey, iv, { authTagLength: TAG_LENGTH });
    cipher.setAAD(this.additionalData);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return encodeBase64Url(Buffer.concat([iv, ciphertext, cipher.getAuthTag()]));
  }

  decode(envelope: string): Result<TToken, EnvelopeError> {
    const bytes = decodeBase64Url(envelope);
    if (!bytes) {
      return envelopeError("envelope.invalid", "Envelope is not valid base64url");
    }
    if (bytes.length < IV_LENGTH + TAG_LENGTH) {
      return envelopeError("envelope.invalid", "Envelope is too short", { length: bytes.length });
    }

    const iv = bytes.subarray(0, IV_LENGTH);
    const ciphertext = bytes.subarray(IV_LENGTH, bytes.length - TAG_LENGTH);
    const tag = bytes.subarray(bytes.length - TAG_LENGTH);

    for (const key of this.decryptionKeys) {
      const plaintext = this.decrypt(key, iv, ciphertext, tag);
      if (plaintext) {
        return deserializeToken(plaintext, this.schema);
      }
    }

    return envelopeError("envelope.authentication_failed", "Envelope failed authentication");
  }

  private decrypt(key: Buffer, iv: Buffer, ciphertext: Buffer, tag: Buffer): Buffer | undefined {
    const decipher = createDecipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAAD(this.additionalData);
    decipher.setAuthTag(tag);
    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      // final() throws when the tag does not verify under this key.
      return undefined;
    }
  }
}

export const createEncryptedEnvelopeCodec = <TToken extends SessionToken>(
  options: EncryptedEnvelopeCodecOptions<TToken>,
): TokenEnvelopeCodec<TToken> => new EncryptedEnvelopeCodec(options);
