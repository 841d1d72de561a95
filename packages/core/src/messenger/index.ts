export * from "./Messenger.js";
export * from "./schemaValidator.js";
export * from "./topic.js";
