import { GeogateReasons, geogateError } from "@geogate/errors";
import type { PermanentPermissionStore } from "../permissions/PermanentPermissionStore.js";
import {
  PERMANENT_PERMISSIONS_SNAPSHOT_VERSION,
  type PermanentPermissionsSnapshot,
  PermanentPermissionsSnapshotSchema,
} from "./schemas.js";
import type { PermanentPermissionsPort } from "./types.js";

export type PermissionsStorageSyncOptions = {
  store: PermanentPermissionStore;
  port: PermanentPermissionsPort;
  now?: () => number;
  logger?: (message: string, error?: unknown) => void;
};

export type PermissionsStorageSync = {
  hydrate(): Promise<void>;
  attach(): void;
  detach(): void;
  isAttached(): boolean;
};

export const createPermissionsStorageSync = ({
  store,
  port,
  now = Date.now,
  logger = () => {},
}: PermissionsStorageSyncOptions): PermissionsStorageSync => {
  let unsubscribe: (() => void) | null = null;

  const loadValidated = async () => {
    const raw = await port.loadSnapshot();
    if (raw === null || raw === undefined) return null;

    const parsed = PermanentPermissionsSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw geogateError({
        reason: GeogateReasons.StorageInvalidSnapshot,
        message: "Stored permanent permissions snapshot is invalid",
        data: { issues: parsed.error.issues.map((issue) => issue.message) },
        cause: parsed.error,
      });
    }
    return parsed.data;
  };

  const hydrate = async () => {
    try {
      const snapshot = await loadValidated();
      if (!snapshot) return;
      store.replaceState({ origins: { ...snapshot.payload.origins } });
    } catch (error) {
      logger("storage: failed to hydrate permanent permissions", error);
      try {
        await port.clearSnapshot();
      } catch (clearError) {
        logger("storage: failed to clear permanent permissions snapshot", clearError);
      }
    }
  };

  const attach = () => {
    if (unsubscribe) return;
    unsubscribe = store.onStateChanged((state) => {
      const envelope: PermanentPermissionsSnapshot = {
        version: PERMANENT_PERMISSIONS_SNAPSHOT_VERSION,
        updatedAt: now(),
        payload: { origins: { ...state.origins } },
      };
      void port.saveSnapshot(envelope).catch((error: unknown) => {
        logger("storage: failed to persist permanent permissions snapshot", error);
      });
    });
  };

  const detach = () => {
    unsubscribe?.();
    unsubscribe = null;
  };

  return {
    hydrate,
    attach,
    detach,
    isAttached: () => unsubscribe !== null,
  };
};
