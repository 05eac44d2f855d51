export * from "./crypto/hash.js";
export * from "./auth/ledger-call.js";
export * from "./types/asset.js";
export * from "./types/events.js";
export * from "./types/api.js";
