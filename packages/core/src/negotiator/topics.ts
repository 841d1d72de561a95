import { z } from "zod";
import { schemaValidator } from "../messenger/schemaValidator.js";
import { eventTopic } from "../messenger/topic.js";
import { originKeySchema } from "../origin/originKey.js";
import type { DecisionDeliveredEvent, DecisionRecordedEvent } from "./types.js";

const tabIdSchema = z.string().min(1);

const DecisionDeliveredEventSchema = z.strictObject({
  tabId: tabIdSchema,
  origin: originKeySchema,
  allow: z.boolean(),
  source: z.enum(["prompt", "cache", "cancellation"]),
  consumers: z.number().int().nonnegative(),
});

const DecisionRecordedEventSchema = z.strictObject({
  tabId: tabIdSchema,
  origin: originKeySchema,
  allow: z.boolean(),
  remember: z.boolean(),
});

export const NEGOTIATOR_DECISION_DELIVERED = eventTopic<DecisionDeliveredEvent>("negotiator:decisionDelivered", {
  validate: schemaValidator(DecisionDeliveredEventSchema),
});

export const NEGOTIATOR_DECISION_RECORDED = eventTopic<DecisionRecordedEvent>("negotiator:decisionRecorded", {
  validate: schemaValidator(DecisionRecordedEventSchema),
});
