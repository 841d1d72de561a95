import type { OriginKey } from "../origin/originKey.js";
import type { PermissionDecision } from "../permissions/types.js";

/**
 * Host UI that asks the user about an origin. Both calls are fire-and-forget; the answer comes back
 * through `PermissionNegotiator.provideDecision`.
 */
export type Prompter = {
  showPrompt(origin: OriginKey): void;
  hidePrompt(): void;
};

/**
 * A document's location object waiting on a decision.
 */
export type ConsumerHandle = {
  setAllowed(allow: boolean): void;
};

/**
 * Visits every frame of a tab. The handle is null/undefined when the frame's document has no live
 * location object (e.g. the page changed since the request).
 */
export type FrameWalker<TRoot> = {
  forEachConsumer(root: TRoot, fn: (origin: OriginKey, consumer: ConsumerHandle | null | undefined) => void): void;
};

/**
 * Single-slot zero-delay task. Scheduling again replaces the pending callback.
 */
export type DeferredScheduler = {
  scheduleImmediate(callback: () => void): void;
  cancel(): void;
};

export type DeliverySource = "prompt" | "cache" | "cancellation";

export type DecisionDeliveredEvent = {
  tabId: string;
  origin: OriginKey;
  allow: boolean;
  source: DeliverySource;
  consumers: number;
};

export type DecisionRecordedEvent = PermissionDecision & { tabId: string };

export type NegotiatorState = {
  tabId: string;
  originInProgress: OriginKey | null;
  queuedOrigins: OriginKey[];
  temporaryDecisions: Record<OriginKey, boolean>;
  pendingDelivery: { origin: OriginKey; allow: boolean } | null;
};
