import { createHmac, timingSafeEqual } from "node:crypto";

import type { SignerPort } from "@sessionguard/contracts";

import { deriveKey } from "./key-derivation.js";

export const DEFAULT_SIGNER_PURPOSE = "sessionguard.signer.v1";

export interface HmacSha256SignerOptions {
  readonly secret: string;
  readonly purpose?: string;
}

export class HmacSha256Signer implements SignerPort {
  private readonly key: Buffer;

  constructor(options: HmacSha256SignerOptions) {
    if (!options.secret || options.secret.length === 0) {
      throw new Error("HmacSha256Signer requires a non-empty secret");
    }

    this.key = deriveKey(options.secret, options.purpose ?? DEFAULT_SIGNER_PURPOSE);
  }

  sign(input: Uint8Array): Uint8Array {
    return createHmac("sha256", this.key).update(input).digest();
  }

  verify(input: Uint8Array, signature: Uint8Array): boolean {
    const expected = this.sign(input);
    // MAC length is public; only the contents need a constant-time compare.
    if (signature.length !== expected.length) {
      return false;
    }
    return timingSafeEqual(expected, signature);
  }
}

export const createHmacSha256Signer = (options: HmacSha256SignerOptions): SignerPort =>
  new HmacSha256Signer(options);
