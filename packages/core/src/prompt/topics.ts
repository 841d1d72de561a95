import { z } from "zod";
import { schemaValidator } from "../messenger/schemaValidator.js";
import { eventTopic } from "../messenger/topic.js";
import { originKeySchema } from "../origin/originKey.js";

const PromptShownEventSchema = z.strictObject({
  tabId: z.string().min(1),
  origin: originKeySchema,
});

const PromptHiddenEventSchema = z.strictObject({
  tabId: z.string().min(1),
});

export type PromptShownEvent = z.infer<typeof PromptShownEventSchema>;

export type PromptHiddenEvent = z.infer<typeof PromptHiddenEventSchema>;

export const PROMPT_SHOWN = eventTopic<PromptShownEvent>("prompt:shown", {
  validate: schemaValidator(PromptShownEventSchema),
});

export const PROMPT_HIDDEN = eventTopic<PromptHiddenEvent>("prompt:hidden", {
  validate: schemaValidator(PromptHiddenEventSchema),
});
