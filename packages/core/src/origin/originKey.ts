import { GeogateReasons, geogateError } from "@geogate/errors";
import { z } from "zod";

/**
 * Serialized security origin (scheme + host + port), e.g. `https://maps.example:8443`.
 * Compared by string value only: origin objects get recreated, so identity never matches.
 */
export type OriginKey = string;

export const originKeySchema = z.string().min(1, { error: "origin key must be a non-empty string" });

/**
 * Derive an origin key from a document URL.
 * Opaque origins (data:, about:, file: on most hosts) all serialize to "null", the same key the
 * browser reports for them.
 */
export const toOriginKey = (input: string | URL): OriginKey => {
  let parsed: URL;
  try {
    parsed = typeof input === "string" ? new URL(input) : input;
  } catch (error) {
    throw geogateError({
      reason: GeogateReasons.OriginInvalid,
      message: `Cannot derive an origin from "${String(input)}"`,
      data: { input: String(input) },
      cause: error,
    });
  }
  return parsed.origin;
};
