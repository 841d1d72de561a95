import { vi } from "vitest";
import { createFrame, type FrameNode, frameTreeWalker } from "../frames/frameTree.js";
import { Messenger } from "../messenger/Messenger.js";
import { createPermissionHub, type PermissionHub } from "../permissions/PermissionHub.js";
import { PermissionNegotiator } from "./PermissionNegotiator.js";
import { NEGOTIATOR_DECISION_DELIVERED } from "./topics.js";
import type { ConsumerHandle, DecisionDeliveredEvent, DeferredScheduler } from "./types.js";

export const ORIGIN_A = "https://maps.example";
export const ORIGIN_B = "https://weather.example";
export const ORIGIN_C = "https://transit.example:8443";

export type ManualScheduler = DeferredScheduler & {
  flush(): void;
  isPending(): boolean;
};

export const createManualScheduler = (): ManualScheduler => {
  let pending: (() => void) | null = null;
  return {
    scheduleImmediate(callback) {
      pending = callback;
    },
    cancel() {
      pending = null;
    },
    flush() {
      const run = pending;
      pending = null;
      run?.();
    },
    isPending() {
      return pending !== null;
    },
  };
};

export const createConsumer = () => {
  const setAllowed = vi.fn<(allow: boolean) => void>();
  const handle: ConsumerHandle = { setAllowed };
  return { handle, setAllowed };
};

export const createRecordingPrompter = () => {
  const shown: string[] = [];
  let hidden = 0;
  return {
    shown,
    getHiddenCount: () => hidden,
    prompter: {
      showPrompt(origin: string) {
        shown.push(origin);
      },
      hidePrompt() {
        hidden += 1;
      },
    },
  };
};

export const createSharedSetup = () => {
  const messenger = new Messenger();
  const hub = createPermissionHub({ messenger });
  const delivered: DecisionDeliveredEvent[] = [];
  messenger.subscribe(NEGOTIATOR_DECISION_DELIVERED, (event) => delivered.push(event));
  return { messenger, hub, delivered };
};

/**
 * A tab whose main frame shows ORIGIN_A with one subframe per other origin; every frame has a consumer.
 */
export const createTab = (shared: { messenger: Messenger; hub: PermissionHub }, tabId = "tab-1") => {
  const consumers = {
    [ORIGIN_A]: createConsumer(),
    [ORIGIN_B]: createConsumer(),
    [ORIGIN_C]: createConsumer(),
  };
  const root: FrameNode = createFrame(ORIGIN_A, {
    geolocation: consumers[ORIGIN_A].handle,
    children: [
      createFrame(ORIGIN_B, { geolocation: consumers[ORIGIN_B].handle }),
      createFrame(ORIGIN_C, { geolocation: consumers[ORIGIN_C].handle }),
    ],
  });
  const scheduler = createManualScheduler();
  const prompts = createRecordingPrompter();

  const negotiator = new PermissionNegotiator<FrameNode>({
    hub: shared.hub,
    tabId,
    root,
    frameWalker: frameTreeWalker,
    prompter: prompts.prompter,
    scheduler,
    messenger: shared.messenger,
  });

  return { negotiator, root, consumers, scheduler, prompts };
};
