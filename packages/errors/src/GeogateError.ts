import type { GeogateErrorData, GeogateReason } from "./reasons.js";

export type GeogateErrorInput<R extends GeogateReason> = {
  reason: R;
  message: string;
  data: GeogateErrorData[R];
  cause?: unknown;
};

export class GeogateError<R extends GeogateReason = GeogateReason> extends Error {
  readonly reason: R;
  readonly data: GeogateErrorData[R];

  constructor(input: GeogateErrorInput<R>) {
    super(input.message, input.cause !== undefined ? { cause: input.cause } : undefined);
    this.name = "GeogateError";
    this.reason = input.reason;
    this.data = input.data;
  }
}

export const geogateError = <R extends GeogateReason>(input: GeogateErrorInput<R>): GeogateError<R> =>
  new GeogateError(input);

export const isGeogateError = (value: unknown): value is GeogateError => value instanceof GeogateError;

/**
 * Narrows to one failure mode, typing `data` along with it.
 */
export const hasReason = <R extends GeogateReason>(value: unknown, reason: R): value is GeogateError<R> =>
  isGeogateError(value) && value.reason === reason;
