import debug, { type Debugger } from "debug";

const DEFAULT_PREFIX = "geogate";

/**
 * Create a namespaced debug logger under the shared `geogate:` prefix.
 * Visibility is controlled through the DEBUG env var, e.g. `DEBUG=geogate:*`.
 */
export const createLogger = (namespace: string, options?: { prefix?: string }): Debugger => {
  const prefix = options?.prefix ?? DEFAULT_PREFIX;
  return debug(`${prefix}:${namespace}`);
};

export const extendLogger = (logger: Debugger, suffix: string): Debugger => {
  return typeof logger.extend === "function" ? logger.extend(suffix) : createLogger(`${logger.namespace}:${suffix}`);
};

/**
 * Adapts a debug logger to the `(message, error)` callback shape taken by persistence and messenger hooks.
 */
export const toErrorLogger =
  (logger: Debugger) =>
  (message: string, error?: unknown): void => {
    if (error === undefined) {
      logger(message);
      return;
    }
    logger("%s %O", message, error);
  };
