export * from "./PermanentPermissionStore.js";
export * from "./PermissionHub.js";
export * from "./topics.js";
export type * from "./types.js";
