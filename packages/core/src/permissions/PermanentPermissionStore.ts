import type { Debugger } from "debug";
import type { Messenger } from "../messenger/Messenger.js";
import type { Unsubscribe } from "../messenger/topic.js";
import type { OriginKey } from "../origin/originKey.js";
import { createLogger } from "../utils/logger.js";
import { PERMANENT_PERMISSIONS_CHANGED, PERMANENT_PERMISSIONS_STATE_CHANGED } from "./topics.js";
import type { PermanentPermissionsChange, PermanentPermissionsState } from "./types.js";

export type PermanentPermissionStoreOptions = {
  messenger: Messenger;
  initialState?: PermanentPermissionsState;
  logger?: Debugger;
};

const toState = (decisions: ReadonlyMap<OriginKey, boolean>): PermanentPermissionsState => ({
  origins: Object.fromEntries(decisions),
});

/**
 * Process-wide origin -> allow/deny table shared by every tab.
 * Only `record`, `clear`, `clearAll` and `replaceState` mutate it.
 */
export class PermanentPermissionStore {
  #messenger: Messenger;
  #logger: Debugger;
  #decisions = new Map<OriginKey, boolean>();

  constructor({ messenger, initialState, logger }: PermanentPermissionStoreOptions) {
    this.#messenger = messenger;
    this.#logger = logger ?? createLogger("permissions:permanent");
    if (initialState) {
      for (const [origin, allow] of Object.entries(initialState.origins)) {
        this.#decisions.set(origin, allow);
      }
    }
    this.#publishState();
  }

  has(origin: OriginKey): boolean {
    return this.#decisions.has(origin);
  }

  get(origin: OriginKey): boolean | undefined {
    return this.#decisions.get(origin);
  }

  /**
   * Stored decision for the origin, or false when none was remembered.
   */
  isAllowed(origin: OriginKey): boolean {
    return this.#decisions.get(origin) ?? false;
  }

  listOrigins(): Set<OriginKey> {
    return new Set(this.#decisions.keys());
  }

  record(origin: OriginKey, allow: boolean): void {
    if (this.#decisions.get(origin) === allow) return;

    this.#decisions.set(origin, allow);
    this.#logger("recorded %s -> %s", origin, allow ? "allow" : "deny");
    this.#publishChange({ type: "recorded", origin, allow });
  }

  clear(origin: OriginKey): void {
    if (!this.#decisions.delete(origin)) return;

    this.#logger("cleared %s", origin);
    this.#publishChange({ type: "cleared", origin });
  }

  clearAll(): void {
    if (this.#decisions.size === 0) return;

    const origins = [...this.#decisions.keys()];
    this.#decisions.clear();
    this.#logger("cleared %d origins", origins.length);
    this.#publishChange({ type: "clearedAll", origins });
  }

  getState(): PermanentPermissionsState {
    return toState(this.#decisions);
  }

  /**
   * Swap in a full table, e.g. one hydrated from storage. No-op when nothing differs.
   */
  replaceState(state: PermanentPermissionsState): void {
    const next = new Map(Object.entries(state.origins));
    const same =
      next.size === this.#decisions.size &&
      [...next].every(([origin, allow]) => this.#decisions.get(origin) === allow);
    if (same) return;

    this.#decisions = next;
    this.#publishChange({ type: "replaced" });
  }

  onStateChanged(handler: (state: PermanentPermissionsState) => void): Unsubscribe {
    return this.#messenger.subscribe(PERMANENT_PERMISSIONS_STATE_CHANGED, handler);
  }

  onChanged(handler: (change: PermanentPermissionsChange) => void): Unsubscribe {
    return this.#messenger.subscribe(PERMANENT_PERMISSIONS_CHANGED, handler);
  }

  #publishChange(change: PermanentPermissionsChange) {
    this.#messenger.publish(PERMANENT_PERMISSIONS_CHANGED, change);
    this.#publishState();
  }

  #publishState() {
    this.#messenger.publish(PERMANENT_PERMISSIONS_STATE_CHANGED, this.getState());
  }
}
