import type { z } from "zod";
import type { Validate } from "./topic.js";

/**
 * Topic validator backed by a zod schema.
 */
export const schemaValidator =
  <Payload>(schema: z.ZodType<Payload>): Validate<Payload> =>
  (value): value is Payload =>
    schema.safeParse(value).success;
