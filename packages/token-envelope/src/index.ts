export * from "./base64.js";
export * from "./key-derivation.js";
export * from "./schemas.js";
export * from "./token-serializer.js";
export * from "./hmac-signer.js";
export * from "./encrypted-envelope-codec.js";
export * from "./signed-envelope-codec.js";
