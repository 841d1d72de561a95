export * from "./createGeolocationRuntime.js";
