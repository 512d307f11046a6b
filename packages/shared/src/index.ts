export * from "./types.js";
export * from "./timezone.js";
export * from "./messenger.js";
export * from "./responseTokens.js";
