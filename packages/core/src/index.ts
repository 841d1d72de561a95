export * from "./frames/frameTree.js";
export * from "./messenger/index.js";
export * from "./negotiator/index.js";
export * from "./origin/originKey.js";
export * from "./permissions/index.js";
export * from "./prompt/MessengerPrompter.js";
export * from "./prompt/topics.js";
export * from "./runtime/index.js";
export * from "./scheduler/ImmediateScheduler.js";
export * from "./storage/index.js";
export * from "./utils/logger.js";
