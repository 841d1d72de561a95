import { z } from "zod";
import { schemaValidator } from "../messenger/schemaValidator.js";
import { eventTopic, stateTopic } from "../messenger/topic.js";
import { originKeySchema } from "../origin/originKey.js";
import type { PermanentPermissionsChange, PermanentPermissionsState } from "./types.js";

export const PermanentPermissionsStateSchema = z.strictObject({
  origins: z.record(originKeySchema, z.boolean()),
});

const PermanentPermissionsChangeSchema = z.discriminatedUnion("type", [
  z.strictObject({ type: z.literal("recorded"), origin: originKeySchema, allow: z.boolean() }),
  z.strictObject({ type: z.literal("cleared"), origin: originKeySchema }),
  z.strictObject({ type: z.literal("clearedAll"), origins: z.array(originKeySchema) }),
  z.strictObject({ type: z.literal("replaced") }),
]);

export const isSamePermanentState = (prev: PermanentPermissionsState, next: PermanentPermissionsState): boolean => {
  const prevOrigins = Object.keys(prev.origins);
  const nextOrigins = Object.keys(next.origins);
  if (prevOrigins.length !== nextOrigins.length) return false;
  return prevOrigins.every((origin) => next.origins[origin] === prev.origins[origin]);
};

export const PERMANENT_PERMISSIONS_STATE_CHANGED = stateTopic<PermanentPermissionsState>(
  "permissions:permanentStateChanged",
  { isEqual: isSamePermanentState, validate: schemaValidator(PermanentPermissionsStateSchema) },
);

export const PERMANENT_PERMISSIONS_CHANGED = eventTopic<PermanentPermissionsChange>("permissions:permanentChanged", {
  validate: schemaValidator(PermanentPermissionsChangeSchema),
});
