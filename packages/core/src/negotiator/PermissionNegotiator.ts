import { GeogateReasons, geogateError } from "@geogate/errors";
import type { Debugger } from "debug";
import type { Messenger } from "../messenger/Messenger.js";
import type { OriginKey } from "../origin/originKey.js";
import type { PermissionHub } from "../permissions/PermissionHub.js";
import type { PermissionDecision } from "../permissions/types.js";
import { createImmediateScheduler } from "../scheduler/ImmediateScheduler.js";
import { createLogger } from "../utils/logger.js";
import type { QueuedRequestCanceller } from "./NegotiatorRegistry.js";
import { NEGOTIATOR_DECISION_DELIVERED, NEGOTIATOR_DECISION_RECORDED } from "./topics.js";
import type { DeferredScheduler, DeliverySource, FrameWalker, NegotiatorState, Prompter } from "./types.js";

export type PermissionNegotiatorOptions<TRoot> = {
  hub: PermissionHub;
  tabId: string;
  /**
   * Main frame of the tab; handed back to `frameWalker` on every delivery.
   */
  root: TRoot;
  frameWalker: FrameWalker<TRoot>;
  prompter: Prompter;
  /**
   * Must not be shared with another negotiator. Defaults to an event-loop scheduler.
   */
  scheduler?: DeferredScheduler;
  /**
   * Receives delivered/recorded events when provided.
   */
  messenger?: Messenger;
  logger?: Debugger;
};

type PendingDelivery = { origin: OriginKey; allow: boolean };

/**
 * Per-tab location permission state machine.
 *
 * At most one origin is being prompted for at a time; other origins wait in FIFO order. Decisions
 * are delivered to every frame of the tab showing the origin, since individual requests are not
 * tracked (frames can be torn down and recreated between request and answer).
 */
export class PermissionNegotiator<TRoot = unknown> implements QueuedRequestCanceller {
  readonly tabId: string;

  #hub: PermissionHub;
  #root: TRoot;
  #frameWalker: FrameWalker<TRoot>;
  #prompter: Prompter;
  #scheduler: DeferredScheduler;
  #messenger: Messenger | null;
  #logger: Debugger;

  #temporaryDecisions = new Map<OriginKey, boolean>();
  #originInProgress: OriginKey | null = null;
  #queuedOrigins: OriginKey[] = [];
  #pendingDelivery: PendingDelivery | null = null;

  constructor(options: PermissionNegotiatorOptions<TRoot>) {
    this.tabId = options.tabId;
    this.#hub = options.hub;
    this.#root = options.root;
    this.#frameWalker = options.frameWalker;
    this.#prompter = options.prompter;
    this.#scheduler = options.scheduler ?? createImmediateScheduler();
    this.#messenger = options.messenger ?? null;
    this.#logger = options.logger ?? createLogger(`negotiator:${options.tabId}`);

    this.#hub.registry.add(this);
  }

  /**
   * Ask for a decision on behalf of the tab's frames showing `origin`.
   * Cached answers arrive on a later turn; otherwise the user is prompted, or the origin waits its turn.
   */
  resolve(origin: OriginKey): void {
    // Tab-scoped answers win: the user may have made a one-off choice after a remembered one.
    const temporary = this.#temporaryDecisions.get(origin);
    if (temporary !== undefined) {
      this.#deliverDeferred(origin, temporary);
      return;
    }

    const permanent = this.#hub.store.get(origin);
    if (permanent !== undefined) {
      this.#deliverDeferred(origin, permanent);
      return;
    }

    if (this.#originInProgress === null) {
      this.#originInProgress = origin;
      this.#logger("prompting for %s", origin);
      this.#prompter.showPrompt(origin);
      return;
    }

    if (this.#originInProgress !== origin && !this.#queuedOrigins.includes(origin)) {
      this.#queuedOrigins.push(origin);
      this.#logger("queued %s behind %s", origin, this.#originInProgress);
    }
  }

  /**
   * The user's answer for the prompted origin. Answers for any other origin are stale (the tab
   * was reset while the answer was in transit) and are dropped.
   */
  provideDecision(origin: OriginKey, allow: boolean, remember: boolean): void {
    const inProgress = this.#originInProgress;
    if (inProgress === null || origin !== inProgress) {
      this.#logger("ignoring stale decision for %s", origin);
      return;
    }

    this.#deliver(inProgress, allow, "prompt");

    if (remember) {
      this.#hub.store.record(inProgress, allow);
      // A leftover temporary entry would mask a later clear() of the permanent one.
      this.#temporaryDecisions.delete(origin);
    } else {
      // Recorded even if another tab remembered a decision for this origin meanwhile.
      this.#temporaryDecisions.set(inProgress, allow);
    }
    const decision: PermissionDecision = { origin: inProgress, allow, remember };
    this.#messenger?.publish(NEGOTIATOR_DECISION_RECORDED, { tabId: this.tabId, ...decision });

    if (remember) {
      this.#hub.registry.broadcastCancellation(inProgress);
    }

    const next = this.#queuedOrigins.shift();
    if (next === undefined) {
      this.#originInProgress = null;
      return;
    }

    this.#originInProgress = next;
    this.#logger("prompting for queued %s", next);
    this.#prompter.showPrompt(next);
  }

  /**
   * Called through the registry right after a permanent decision was recorded for `origin`.
   */
  cancelQueued(origin: OriginKey): void {
    const index = this.#queuedOrigins.indexOf(origin);
    if (index === -1) return;

    const allow = this.#hub.store.get(origin);
    if (allow === undefined) {
      throw geogateError({
        reason: GeogateReasons.PermissionMissingPermanentDecision,
        message: `No permanent decision recorded for queued origin "${origin}"`,
        data: { tabId: this.tabId, origin },
      });
    }

    this.#queuedOrigins.splice(index, 1);
    this.#logger("satisfied queued %s from permanent decision", origin);
    this.#deliver(origin, allow, "cancellation");
  }

  /**
   * Forget everything tab-scoped, e.g. on navigation. Answers still in transit become stale.
   */
  reset(): void {
    this.#originInProgress = null;
    this.#queuedOrigins = [];
    this.#temporaryDecisions.clear();
    this.#pendingDelivery = null;
    this.#scheduler.cancel();

    this.#prompter.hidePrompt();
  }

  /**
   * Tab closed. Unregisters from the hub, drops queued requests and any pending delivery, and takes
   * down a prompt that is still showing. The hub's permanent decisions are untouched.
   */
  destroy(): void {
    const prompting = this.#originInProgress !== null;
    this.#originInProgress = null;
    this.#queuedOrigins = [];
    this.#pendingDelivery = null;
    this.#scheduler.cancel();
    this.#hub.registry.remove(this);

    if (prompting) this.#prompter.hidePrompt();
  }

  getState(): NegotiatorState {
    return {
      tabId: this.tabId,
      originInProgress: this.#originInProgress,
      queuedOrigins: [...this.#queuedOrigins],
      temporaryDecisions: Object.fromEntries(this.#temporaryDecisions),
      pendingDelivery: this.#pendingDelivery ? { ...this.#pendingDelivery } : null,
    };
  }

  #deliverDeferred(origin: OriginKey, allow: boolean) {
    this.#pendingDelivery = { origin, allow };
    this.#scheduler.scheduleImmediate(() => {
      const pending = this.#pendingDelivery;
      this.#pendingDelivery = null;
      if (!pending) return;
      this.#deliver(pending.origin, pending.allow, "cache");
    });
  }

  #deliver(origin: OriginKey, allow: boolean, source: DeliverySource) {
    let consumers = 0;
    this.#frameWalker.forEachConsumer(this.#root, (frameOrigin, consumer) => {
      if (frameOrigin !== origin || !consumer) return;
      consumer.setAllowed(allow);
      consumers += 1;
    });

    this.#logger("delivered %s for %s to %d consumer(s) [%s]", allow ? "allow" : "deny", origin, consumers, source);
    this.#messenger?.publish(NEGOTIATOR_DECISION_DELIVERED, {
      tabId: this.tabId,
      origin,
      allow,
      source,
      consumers,
    });
  }
}
