export * from "./createPermissionsStorageSync.js";
export * from "./schemas.js";
export type { PermanentPermissionsPort } from "./types.js";
