export type { GeogateErrorInput } from "./GeogateError.js";
export { GeogateError, geogateError, hasReason, isGeogateError } from "./GeogateError.js";
export type { GeogateErrorData, GeogateReason } from "./reasons.js";
export { GeogateReasons } from "./reasons.js";
