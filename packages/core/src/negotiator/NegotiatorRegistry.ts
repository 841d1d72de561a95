import type { OriginKey } from "../origin/originKey.js";

/**
 * What the registry needs from a negotiator: drop a queued request once a permanent decision exists.
 */
export type QueuedRequestCanceller = {
  cancelQueued(origin: OriginKey): void;
};

/**
 * Live negotiators, held weakly so a tab that was never destroyed does not stay reachable.
 * Only iterated when a remembered decision is broadcast.
 */
export class NegotiatorRegistry {
  #entries = new Set<WeakRef<QueuedRequestCanceller>>();

  add(negotiator: QueuedRequestCanceller): void {
    if (this.#find(negotiator)) return;
    this.#entries.add(new WeakRef(negotiator));
  }

  remove(negotiator: QueuedRequestCanceller): boolean {
    const ref = this.#find(negotiator);
    if (!ref) return false;
    this.#entries.delete(ref);
    return true;
  }

  has(negotiator: QueuedRequestCanceller): boolean {
    return this.#find(negotiator) !== undefined;
  }

  get size(): number {
    this.#prune();
    return this.#entries.size;
  }

  broadcastCancellation(origin: OriginKey): void {
    for (const ref of Array.from(this.#entries)) {
      const negotiator = ref.deref();
      if (!negotiator) {
        this.#entries.delete(ref);
        continue;
      }
      negotiator.cancelQueued(origin);
    }
  }

  #find(negotiator: QueuedRequestCanceller): WeakRef<QueuedRequestCanceller> | undefined {
    for (const ref of this.#entries) {
      if (ref.deref() === negotiator) return ref;
    }
    return undefined;
  }

  #prune() {
    for (const ref of Array.from(this.#entries)) {
      if (!ref.deref()) this.#entries.delete(ref);
    }
  }
}
