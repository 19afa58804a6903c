export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/session.js";

export * from "./errors/api-error.js";

export * from "./ports/sessions/session-store-port.js";
export * from "./ports/signing/signer-port.js";
export * from "./ports/origins/origin-validator-port.js";
export * from "./ports/envelopes/token-envelope-codec-port.js";

export * from "./sessions/identified-token.js";
