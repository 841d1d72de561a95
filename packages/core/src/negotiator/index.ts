export * from "./NegotiatorRegistry.js";
export * from "./PermissionNegotiator.js";
export * from "./topics.js";
export type * from "./types.js";
