export * from "./access-options.js";
export * from "./config.js";
export * from "./cookie.js";
export * from "./device.js";
export * from "./options.js";
export * from "./origin-validator.js";
export * from "./refresh.js";
export * from "./request.js";
export * from "./session-context.js";
export * from "./session-context-factory.js";
export * from "./telemetry.js";
