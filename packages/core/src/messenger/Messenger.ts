import type { Debugger } from "debug";
import { createLogger } from "../utils/logger.js";
import type { Topic, Unsubscribe } from "./topic.js";

export type ViolationMode = "throw" | "warn" | "off";

export type PublishOptions = {
  /**
   * Publish even when a remembered topic's payload is unchanged.
   */
  force?: boolean;
};

export type SubscribeOptions = {
  /**
   * Immediately replay the remembered snapshot, if any.
   */
  replay?: "none" | "snapshot";
  signal?: AbortSignal;
};

export type ListenerErrorHandler = (info: { topic: string; error: unknown }) => void;

type AnyListener = (payload: unknown) => void;

export type MessengerOptions = {
  onListenerError?: ListenerErrorHandler;
  violationMode?: ViolationMode;
  logger?: Debugger;
};

/**
 * Topic bus shared by the hub, the negotiators and the host UI.
 * Listener errors never reach the publisher; they go to `onListenerError`.
 */
export class Messenger {
  #listeners = new Map<string, Set<AnyListener>>();
  #snapshots = new Map<string, unknown>();

  #onListenerError: ListenerErrorHandler;
  #violationMode: ViolationMode;
  #logger: Debugger;

  constructor(opts: MessengerOptions = {}) {
    this.#logger = opts.logger ?? createLogger("messenger");
    this.#onListenerError =
      opts.onListenerError ?? (({ topic, error }) => this.#logger("listener error in %s: %O", topic, error));
    this.#violationMode = opts.violationMode ?? "throw";
  }

  publish<T>(topic: Topic<T>, payload: T, options: PublishOptions = {}): void {
    if (topic.validate && !topic.validate(payload)) {
      this.#handleInvalidPayload(topic.name);
      return;
    }

    if (topic.remember) {
      if (!options.force && this.#snapshots.has(topic.name)) {
        const prev = this.#snapshots.get(topic.name) as T;
        const isEqual = topic.isEqual ?? Object.is;
        if (isEqual(prev, payload)) return;
      }
      this.#snapshots.set(topic.name, payload);
    }

    const set = this.#listeners.get(topic.name);
    if (!set || set.size === 0) return;

    for (const handler of Array.from(set)) {
      this.#invoke(topic.name, handler, payload);
    }
  }

  subscribe<T>(topic: Topic<T>, handler: (payload: T) => void, options: SubscribeOptions = {}): Unsubscribe {
    const listener = handler as AnyListener;
    const set = this.#listeners.get(topic.name) ?? new Set<AnyListener>();
    set.add(listener);
    this.#listeners.set(topic.name, set);

    if (options.replay === "snapshot" && this.#snapshots.has(topic.name)) {
      this.#invoke(topic.name, listener, this.#snapshots.get(topic.name));
    }

    const unsubscribe = () => {
      const cur = this.#listeners.get(topic.name);
      if (!cur) return;
      cur.delete(listener);
      if (cur.size === 0) this.#listeners.delete(topic.name);
    };

    if (options.signal) {
      if (options.signal.aborted) {
        unsubscribe();
      } else {
        options.signal.addEventListener("abort", unsubscribe, { once: true });
      }
    }

    return unsubscribe;
  }

  getSnapshot<T>(topic: Topic<T>): T | undefined {
    return this.#snapshots.get(topic.name) as T | undefined;
  }

  listenerCount(topic: Topic<unknown>): number {
    return this.#listeners.get(topic.name)?.size ?? 0;
  }

  clear(topic?: Topic<unknown>): void {
    if (!topic) {
      this.#listeners.clear();
      this.#snapshots.clear();
      return;
    }
    this.#listeners.delete(topic.name);
    this.#snapshots.delete(topic.name);
  }

  #invoke(topic: string, handler: AnyListener, payload: unknown) {
    try {
      handler(payload);
    } catch (error) {
      this.#onListenerError({ topic, error });
    }
  }

  #handleInvalidPayload(topic: string) {
    if (this.#violationMode === "off") return;

    const msg = `messenger violation(payload_invalid): ${topic}`;
    if (this.#violationMode === "warn") {
      this.#logger(msg);
      return;
    }

    throw new Error(msg);
  }
}
