import { randomUUID } from "node:crypto";
import { GeogateReasons, geogateError } from "@geogate/errors";
import type { Debugger } from "debug";
import { Messenger, type ViolationMode } from "../messenger/Messenger.js";
import { PermissionNegotiator } from "../negotiator/PermissionNegotiator.js";
import type { DeferredScheduler, FrameWalker, Prompter } from "../negotiator/types.js";
import { createPermissionHub, type PermissionHub } from "../permissions/PermissionHub.js";
import type { PermanentPermissionStore } from "../permissions/PermanentPermissionStore.js";
import type { PermanentPermissionsState } from "../permissions/types.js";
import { createMessengerPrompter } from "../prompt/MessengerPrompter.js";
import { createPermissionsStorageSync, type PermissionsStorageSync } from "../storage/createPermissionsStorageSync.js";
import type { PermanentPermissionsPort } from "../storage/types.js";
import { createLogger, extendLogger, toErrorLogger } from "../utils/logger.js";

export type CreateGeolocationRuntimeOptions = {
  messenger?: {
    violationMode?: ViolationMode;
  };
  permissions?: {
    initialState?: PermanentPermissionsState;
  };
  storage?: {
    port: PermanentPermissionsPort;
    now?: () => number;
  };
  logger?: Debugger;
};

export type OpenTabOptions<TRoot> = {
  root: TRoot;
  frameWalker: FrameWalker<TRoot>;
  prompter?: Prompter;
  scheduler?: DeferredScheduler;
  tabId?: string;
};

export type GeolocationRuntime = {
  bus: Messenger;
  hub: PermissionHub;
  permissions: PermanentPermissionStore;
  storageSync: PermissionsStorageSync | null;
  openTab<TRoot>(options: OpenTabOptions<TRoot>): PermissionNegotiator<TRoot>;
  closeTab(negotiator: PermissionNegotiator<unknown>): void;
  listTabs(): string[];
  lifecycle: {
    initialize(): Promise<void>;
    destroy(): void;
    getIsInitialized(): boolean;
    getIsDestroyed(): boolean;
  };
};

export const createGeolocationRuntime = (options: CreateGeolocationRuntimeOptions = {}): GeolocationRuntime => {
  const logger = options.logger ?? createLogger("runtime");
  const reportError = toErrorLogger(logger);

  const bus = new Messenger({
    violationMode: options.messenger?.violationMode ?? "throw",
    logger: extendLogger(logger, "messenger"),
    onListenerError: ({ topic, error }) => reportError(`messenger: listener error in "${topic}"`, error),
  });

  const hub = createPermissionHub({
    messenger: bus,
    logger: extendLogger(logger, "permissions"),
    ...(options.permissions?.initialState ? { initialState: options.permissions.initialState } : {}),
  });

  const storageSync = options.storage
    ? createPermissionsStorageSync({
        store: hub.store,
        port: options.storage.port,
        logger: reportError,
        ...(options.storage.now ? { now: options.storage.now } : {}),
      })
    : null;

  const tabs = new Map<string, PermissionNegotiator<unknown>>();
  let initialized = false;
  let destroyed = false;
  let initializePromise: Promise<void> | null = null;

  const openTab = <TRoot>(tab: OpenTabOptions<TRoot>): PermissionNegotiator<TRoot> => {
    if (destroyed) {
      throw geogateError({
        reason: GeogateReasons.RuntimeDestroyed,
        message: "Runtime has been destroyed",
        data: { tabId: tab.tabId ?? null },
      });
    }

    const tabId = tab.tabId ?? randomUUID();
    if (tabs.has(tabId)) {
      throw geogateError({
        reason: GeogateReasons.RuntimeDuplicateTab,
        message: `Tab "${tabId}" is already open`,
        data: { tabId },
      });
    }
    const negotiator = new PermissionNegotiator<TRoot>({
      hub,
      tabId,
      root: tab.root,
      frameWalker: tab.frameWalker,
      prompter: tab.prompter ?? createMessengerPrompter({ messenger: bus, tabId }),
      messenger: bus,
      logger: extendLogger(logger, `tab:${tabId}`),
      ...(tab.scheduler ? { scheduler: tab.scheduler } : {}),
    });
    tabs.set(tabId, negotiator);
    return negotiator;
  };

  const closeTab = (negotiator: PermissionNegotiator<unknown>) => {
    negotiator.destroy();
    if (tabs.get(negotiator.tabId) === negotiator) {
      tabs.delete(negotiator.tabId);
    }
  };

  const initialize = async () => {
    if (initialized || destroyed) return;
    if (initializePromise) {
      await initializePromise;
      return;
    }

    initializePromise = (async () => {
      if (storageSync) {
        await storageSync.hydrate();
        if (destroyed) return;
        storageSync.attach();
      }
      initialized = true;
    })();

    try {
      await initializePromise;
    } finally {
      initializePromise = null;
    }
  };

  const destroy = () => {
    if (destroyed) return;
    destroyed = true;

    storageSync?.detach();
    for (const negotiator of tabs.values()) {
      negotiator.destroy();
    }
    tabs.clear();
    bus.clear();
  };

  return {
    bus,
    hub,
    permissions: hub.store,
    storageSync,
    openTab,
    closeTab,
    listTabs: () => [...tabs.keys()],
    lifecycle: {
      initialize,
      destroy,
      getIsInitialized: () => initialized,
      getIsDestroyed: () => destroyed,
    },
  };
};
