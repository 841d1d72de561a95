import type { Debugger } from "debug";
import type { Messenger } from "../messenger/Messenger.js";
import { NegotiatorRegistry } from "../negotiator/NegotiatorRegistry.js";
import { createLogger, extendLogger } from "../utils/logger.js";
import { PermanentPermissionStore } from "./PermanentPermissionStore.js";
import type { PermanentPermissionsState } from "./types.js";

/**
 * Process-wide state handed to every negotiator: the permanent decisions and the live-tab registry.
 * Build one per runtime; never share a store across hubs.
 */
export type PermissionHub = {
  store: PermanentPermissionStore;
  registry: NegotiatorRegistry;
};

export type CreatePermissionHubOptions = {
  messenger: Messenger;
  initialState?: PermanentPermissionsState;
  logger?: Debugger;
};

export const createPermissionHub = ({ messenger, initialState, logger }: CreatePermissionHubOptions): PermissionHub => {
  const base = logger ?? createLogger("permissions");
  return {
    store: new PermanentPermissionStore({
      messenger,
      logger: extendLogger(base, "permanent"),
      ...(initialState ? { initialState } : {}),
    }),
    registry: new NegotiatorRegistry(),
  };
};
