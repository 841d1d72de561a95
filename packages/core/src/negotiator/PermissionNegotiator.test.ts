import { GeogateReasons, hasReason } from "@geogate/errors";
import { describe, expect, it, vi } from "vitest";
import { createFrame, frameTreeWalker } from "../frames/frameTree.js";
import {
  createConsumer,
  createRecordingPrompter,
  createSharedSetup,
  createTab,
  ORIGIN_A,
  ORIGIN_B,
  ORIGIN_C,
} from "./negotiator.test.helpers.js";
import { PermissionNegotiator } from "./PermissionNegotiator.js";
import { NEGOTIATOR_DECISION_RECORDED } from "./topics.js";
import type { DecisionRecordedEvent } from "./types.js";

describe("PermissionNegotiator", () => {
  describe("resolve()", () => {
    it("prompts when nothing is cached or in flight", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);

      expect(prompts.shown).toEqual([ORIGIN_A]);
      expect(negotiator.getState().originInProgress).toBe(ORIGIN_A);
      expect(consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
    });

    it("prompts once for repeated requests of the in-flight origin", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_A);

      expect(prompts.shown).toEqual([ORIGIN_A]);
      expect(negotiator.getState().queuedOrigins).toEqual([]);
    });

    it("queues other origins once each, in arrival order", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_B);
      negotiator.resolve(ORIGIN_C);
      negotiator.resolve(ORIGIN_B);

      expect(prompts.shown).toEqual([ORIGIN_A]);
      expect(negotiator.getState().queuedOrigins).toEqual([ORIGIN_B, ORIGIN_C]);
    });

    it("answers a remembered origin on a later turn without prompting", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, scheduler, consumers } = createTab(shared);
      shared.hub.store.record(ORIGIN_B, false);

      negotiator.resolve(ORIGIN_B);

      expect(prompts.shown).toEqual([]);
      expect(consumers[ORIGIN_B].setAllowed).not.toHaveBeenCalled();
      expect(negotiator.getState().pendingDelivery).toEqual({ origin: ORIGIN_B, allow: false });

      scheduler.flush();

      expect(consumers[ORIGIN_B].setAllowed.mock.calls).toEqual([[false]]);
      expect(negotiator.getState().pendingDelivery).toBeNull();
      expect(shared.delivered).toEqual([
        { tabId: "tab-1", origin: ORIGIN_B, allow: false, source: "cache", consumers: 1 },
      ]);
    });

    it("prefers the tab's temporary decision over a permanent one", () => {
      const shared = createSharedSetup();
      const { negotiator, scheduler, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, true, false);
      shared.hub.store.record(ORIGIN_A, false);

      negotiator.resolve(ORIGIN_A);
      scheduler.flush();

      expect(consumers[ORIGIN_A].setAllowed.mock.calls).toEqual([[true], [true]]);
    });

    it("keeps only the latest cache hit when several are pending", () => {
      const shared = createSharedSetup();
      const { negotiator, scheduler, consumers } = createTab(shared);
      shared.hub.store.record(ORIGIN_A, true);
      shared.hub.store.record(ORIGIN_C, false);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_C);
      scheduler.flush();

      expect(consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
      expect(consumers[ORIGIN_C].setAllowed.mock.calls).toEqual([[false]]);
    });
  });

  describe("provideDecision()", () => {
    it("delivers inline, records a temporary decision and prompts for the next queued origin", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_B);
      negotiator.resolve(ORIGIN_C);

      negotiator.provideDecision(ORIGIN_A, true, false);

      expect(consumers[ORIGIN_A].setAllowed.mock.calls).toEqual([[true]]);
      expect(prompts.shown).toEqual([ORIGIN_A, ORIGIN_B]);
      expect(negotiator.getState()).toEqual({
        tabId: "tab-1",
        originInProgress: ORIGIN_B,
        queuedOrigins: [ORIGIN_C],
        temporaryDecisions: { [ORIGIN_A]: true },
        pendingDelivery: null,
      });
      expect(shared.hub.store.listOrigins().size).toBe(0);
    });

    it("clears the in-flight origin when the queue is empty", () => {
      const shared = createSharedSetup();
      const { negotiator } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, false, false);

      expect(negotiator.getState().originInProgress).toBeNull();
      expect(negotiator.getState().temporaryDecisions).toEqual({ [ORIGIN_A]: false });
    });

    it("accepts the answer for a queued origin once it is prompted", () => {
      const shared = createSharedSetup();
      const { negotiator, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_B);
      negotiator.provideDecision(ORIGIN_A, true, false);
      negotiator.provideDecision(ORIGIN_B, false, false);

      expect(consumers[ORIGIN_B].setAllowed.mock.calls).toEqual([[false]]);
      expect(negotiator.getState().originInProgress).toBeNull();
      expect(negotiator.getState().temporaryDecisions).toEqual({ [ORIGIN_A]: true, [ORIGIN_B]: false });
    });

    it("writes remembered decisions to the shared store only", () => {
      const shared = createSharedSetup();
      const { negotiator } = createTab(shared);
      const recorded: DecisionRecordedEvent[] = [];
      shared.messenger.subscribe(NEGOTIATOR_DECISION_RECORDED, (event) => recorded.push(event));

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, true, true);

      expect(shared.hub.store.isAllowed(ORIGIN_A)).toBe(true);
      expect([...shared.hub.store.listOrigins()]).toEqual([ORIGIN_A]);
      expect(negotiator.getState().temporaryDecisions).toEqual({});
      expect(recorded).toEqual([{ tabId: "tab-1", origin: ORIGIN_A, allow: true, remember: true }]);
    });

    it("ignores a decision for an origin that is not in flight", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.resolve(ORIGIN_B);
      const before = negotiator.getState();

      negotiator.provideDecision(ORIGIN_B, true, true);

      expect(negotiator.getState()).toEqual(before);
      expect(consumers[ORIGIN_B].setAllowed).not.toHaveBeenCalled();
      expect(shared.hub.store.listOrigins().size).toBe(0);
      expect(prompts.shown).toEqual([ORIGIN_A]);
      expect(shared.delivered).toEqual([]);
    });

    it("ignores a decision when nothing is in flight", () => {
      const shared = createSharedSetup();
      const { negotiator, consumers } = createTab(shared);

      negotiator.provideDecision(ORIGIN_A, true, false);

      expect(consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
      expect(negotiator.getState().temporaryDecisions).toEqual({});
    });

    it("delivers to every frame of the origin and skips frames without a consumer", () => {
      const shared = createSharedSetup();
      const first = createConsumer();
      const second = createConsumer();
      const root = createFrame(ORIGIN_A, {
        geolocation: first.handle,
        children: [
          createFrame(ORIGIN_A, { geolocation: null }),
          createFrame(ORIGIN_B, { children: [createFrame(ORIGIN_A, { geolocation: second.handle })] }),
        ],
      });
      const { prompter } = createRecordingPrompter();
      const negotiator = new PermissionNegotiator({
        hub: shared.hub,
        tabId: "tab-frames",
        root,
        frameWalker: frameTreeWalker,
        prompter,
        messenger: shared.messenger,
      });

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, false, false);

      expect(first.setAllowed.mock.calls).toEqual([[false]]);
      expect(second.setAllowed.mock.calls).toEqual([[false]]);
      expect(shared.delivered).toEqual([
        { tabId: "tab-frames", origin: ORIGIN_A, allow: false, source: "prompt", consumers: 2 },
      ]);
      negotiator.destroy();
    });
  });

  describe("cross-tab cancellation", () => {
    it("satisfies other tabs' queued requests when a decision is remembered", () => {
      const shared = createSharedSetup();
      const tab1 = createTab(shared, "tab-1");
      const tab2 = createTab(shared, "tab-2");

      tab2.negotiator.resolve(ORIGIN_B);
      tab2.negotiator.resolve(ORIGIN_A);
      tab1.negotiator.resolve(ORIGIN_A);

      tab1.negotiator.provideDecision(ORIGIN_A, true, true);

      expect(tab2.consumers[ORIGIN_A].setAllowed.mock.calls).toEqual([[true]]);
      expect(tab2.negotiator.getState().queuedOrigins).toEqual([]);
      expect(tab2.negotiator.getState().originInProgress).toBe(ORIGIN_B);
      expect(tab2.prompts.shown).toEqual([ORIGIN_B]);
      expect(shared.hub.store.get(ORIGIN_A)).toBe(true);
      expect(shared.delivered).toEqual([
        { tabId: "tab-1", origin: ORIGIN_A, allow: true, source: "prompt", consumers: 1 },
        { tabId: "tab-2", origin: ORIGIN_A, allow: true, source: "cancellation", consumers: 1 },
      ]);
    });

    it("leaves other tabs alone for temporary decisions", () => {
      const shared = createSharedSetup();
      const tab1 = createTab(shared, "tab-1");
      const tab2 = createTab(shared, "tab-2");

      tab2.negotiator.resolve(ORIGIN_B);
      tab2.negotiator.resolve(ORIGIN_A);
      tab1.negotiator.resolve(ORIGIN_A);

      tab1.negotiator.provideDecision(ORIGIN_A, true, false);

      expect(tab2.consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
      expect(tab2.negotiator.getState().queuedOrigins).toEqual([ORIGIN_A]);
    });

    it("leaves another tab's in-flight prompt for the same origin untouched", () => {
      const shared = createSharedSetup();
      const tab1 = createTab(shared, "tab-1");
      const tab2 = createTab(shared, "tab-2");

      tab1.negotiator.resolve(ORIGIN_A);
      tab2.negotiator.resolve(ORIGIN_A);
      tab1.negotiator.provideDecision(ORIGIN_A, false, true);

      expect(tab2.negotiator.getState().originInProgress).toBe(ORIGIN_A);
      expect(tab2.consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
    });

    it("cancelQueued() treats a missing permanent decision as a fatal error", () => {
      const shared = createSharedSetup();
      const { negotiator, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_B);
      negotiator.resolve(ORIGIN_A);

      let caught: unknown;
      try {
        negotiator.cancelQueued(ORIGIN_A);
      } catch (error) {
        caught = error;
      }

      if (!hasReason(caught, GeogateReasons.PermissionMissingPermanentDecision)) {
        throw new Error("Expected permission/missing_permanent_decision");
      }
      expect(caught.data).toEqual({ tabId: "tab-1", origin: ORIGIN_A });
      expect(negotiator.getState().queuedOrigins).toEqual([ORIGIN_A]);
      expect(consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
    });

    it("cancelQueued() ignores origins that are not queued", () => {
      const shared = createSharedSetup();
      const { negotiator } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      expect(() => negotiator.cancelQueued(ORIGIN_C)).not.toThrow();
      expect(negotiator.getState().originInProgress).toBe(ORIGIN_A);
    });
  });

  describe("permanent store administration", () => {
    it("prompts again after the remembered decision is cleared", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, true, true);
      shared.hub.store.clear(ORIGIN_A);

      expect(shared.hub.store.listOrigins().has(ORIGIN_A)).toBe(false);
      expect(shared.hub.store.isAllowed(ORIGIN_A)).toBe(false);

      negotiator.resolve(ORIGIN_A);
      expect(prompts.shown).toEqual([ORIGIN_A, ORIGIN_A]);
    });
  });

  describe("reset()", () => {
    it("drops tab state, hides the prompt and cancels the pending delivery", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, scheduler, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, true, false);
      negotiator.resolve(ORIGIN_B);
      negotiator.resolve(ORIGIN_C);
      negotiator.resolve(ORIGIN_A);
      expect(scheduler.isPending()).toBe(true);

      negotiator.reset();

      const expected = {
        tabId: "tab-1",
        originInProgress: null,
        queuedOrigins: [],
        temporaryDecisions: {},
        pendingDelivery: null,
      };
      expect(negotiator.getState()).toEqual(expected);
      expect(prompts.getHiddenCount()).toBe(1);
      expect(scheduler.isPending()).toBe(false);

      scheduler.flush();
      expect(consumers[ORIGIN_A].setAllowed).toHaveBeenCalledTimes(1);

      negotiator.reset();
      expect(negotiator.getState()).toEqual(expected);
    });

    it("turns answers still in transit into stale decisions", () => {
      const shared = createSharedSetup();
      const { negotiator, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.reset();
      negotiator.provideDecision(ORIGIN_A, true, true);

      expect(consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
      expect(shared.hub.store.has(ORIGIN_A)).toBe(false);
    });

    it("keeps permanent decisions", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts } = createTab(shared);

      negotiator.resolve(ORIGIN_A);
      negotiator.provideDecision(ORIGIN_A, false, true);
      negotiator.reset();
      negotiator.resolve(ORIGIN_A);

      expect(prompts.shown).toEqual([ORIGIN_A]);
      expect(negotiator.getState().pendingDelivery).toEqual({ origin: ORIGIN_A, allow: false });
    });
  });

  describe("lifecycle", () => {
    it("registers on construction and unregisters on destroy()", () => {
      const shared = createSharedSetup();
      const tab1 = createTab(shared, "tab-1");
      const tab2 = createTab(shared, "tab-2");
      expect(shared.hub.registry.size).toBe(2);

      tab2.negotiator.resolve(ORIGIN_B);
      tab2.negotiator.resolve(ORIGIN_A);
      tab2.negotiator.destroy();
      expect(shared.hub.registry.has(tab2.negotiator)).toBe(false);

      tab1.negotiator.resolve(ORIGIN_A);
      tab1.negotiator.provideDecision(ORIGIN_A, true, true);

      expect(tab2.consumers[ORIGIN_A].setAllowed).not.toHaveBeenCalled();
      expect(tab2.negotiator.getState().queuedOrigins).toEqual([]);
    });

    it("destroy() hides a prompt that is still showing", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts, consumers } = createTab(shared);

      negotiator.resolve(ORIGIN_B);
      negotiator.resolve(ORIGIN_C);
      negotiator.destroy();

      expect(prompts.getHiddenCount()).toBe(1);
      expect(negotiator.getState()).toEqual({
        tabId: "tab-1",
        originInProgress: null,
        queuedOrigins: [],
        temporaryDecisions: {},
        pendingDelivery: null,
      });

      negotiator.provideDecision(ORIGIN_B, true, false);
      expect(consumers[ORIGIN_B].setAllowed).not.toHaveBeenCalled();
    });

    it("destroy() leaves the prompt alone when nothing is in flight", () => {
      const shared = createSharedSetup();
      const { negotiator, prompts } = createTab(shared);

      negotiator.destroy();

      expect(prompts.getHiddenCount()).toBe(0);
    });

    it("uses an event-loop scheduler when none is given", async () => {
      const shared = createSharedSetup();
      const consumer = createConsumer();
      const { prompter } = createRecordingPrompter();
      const negotiator = new PermissionNegotiator({
        hub: shared.hub,
        tabId: "tab-default",
        root: createFrame(ORIGIN_A, { geolocation: consumer.handle }),
        frameWalker: frameTreeWalker,
        prompter,
      });
      shared.hub.store.record(ORIGIN_A, true);

      negotiator.resolve(ORIGIN_A);
      expect(consumer.setAllowed).not.toHaveBeenCalled();

      await vi.waitFor(() => {
        expect(consumer.setAllowed.mock.calls).toEqual([[true]]);
      });
      negotiator.destroy();
    });
  });
});
