import type { DeferredScheduler } from "../negotiator/types.js";

/**
 * Event-loop backed DeferredScheduler: one pending task at most, the latest callback wins,
 * `cancel()` drops it. Each negotiator needs its own instance.
 */
export const createImmediateScheduler = (): DeferredScheduler & { isPending(): boolean } => {
  let handle: ReturnType<typeof setImmediate> | null = null;
  let pending: (() => void) | null = null;

  const cancel = () => {
    if (handle !== null) {
      clearImmediate(handle);
      handle = null;
    }
    pending = null;
  };

  return {
    scheduleImmediate(callback) {
      pending = callback;
      if (handle !== null) return;

      handle = setImmediate(() => {
        handle = null;
        const run = pending;
        pending = null;
        run?.();
      });
    },
    cancel,
    isPending() {
      return pending !== null;
    },
  };
};
