export * from "./crypto/hash.js";
export * from "./auth/gateway-auth.js";
export * from "./types/identity.js";
export * from "./types/errors.js";
export * from "./types/events.js";
export * from "./types/api.js";
