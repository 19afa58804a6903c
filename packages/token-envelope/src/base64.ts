const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

// Buffer.from skips characters outside the alphabet and ignores the unused low
// bits of the last character, so only canonical encodings are accepted.

export const encodeBase64 = (input: Uint8Array): string => Buffer.from(input).toString("base64");

export const decodeBase64 = (value: string): Buffer | undefined => {
  if (!BASE64_PATTERN.test(value)) {
    return undefined;
  }
  const bytes = Buffer.from(value, "base64");
  return encodeBase64(bytes) === value ? bytes : undefined;
};

export const encodeBase64Url = (input: Uint8Array): string => Buffer.from(input).toString("base64url");

export const decodeBase64Url = (value: string): Buffer | undefined => {
  if (!BASE64URL_PATTERN.test(value)) {
    return undefined;
  }
  const bytes = Buffer.from(value, "base64url");
  return encodeBase64Url(bytes) === value ? bytes : undefined;
};
