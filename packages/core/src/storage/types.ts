import type { PermanentPermissionsSnapshot } from "./schemas.js";

/**
 * Durable home of the remembered decisions. Implemented by the host (IndexedDB, a file, a
 * preferences service); `loadSnapshot` may hand back anything it read, it is validated on hydrate.
 */
export interface PermanentPermissionsPort {
  loadSnapshot(): Promise<unknown>;
  saveSnapshot(envelope: PermanentPermissionsSnapshot): Promise<void>;
  clearSnapshot(): Promise<void>;
}
