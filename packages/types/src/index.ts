export * from "./auth.js";
export * from "./envelope/index.js";
export * from "./errors/index.js";
export * from "./wallet/index.js";
