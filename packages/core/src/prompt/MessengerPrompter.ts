import type { Messenger } from "../messenger/Messenger.js";
import type { Prompter } from "../negotiator/types.js";
import type { OriginKey } from "../origin/originKey.js";
import { PROMPT_HIDDEN, PROMPT_SHOWN } from "./topics.js";

export type MessengerPrompter = Prompter & {
  /**
   * Origin whose prompt is currently on screen for this tab, if any.
   */
  getVisibleOrigin(): OriginKey | null;
};

/**
 * Prompter that only announces prompts on the bus; the host UI renders them and answers through
 * the tab's negotiator.
 */
export const createMessengerPrompter = ({
  messenger,
  tabId,
}: {
  messenger: Messenger;
  tabId: string;
}): MessengerPrompter => {
  let visible: OriginKey | null = null;

  return {
    showPrompt(origin) {
      visible = origin;
      messenger.publish(PROMPT_SHOWN, { tabId, origin });
    },
    hidePrompt() {
      visible = null;
      messenger.publish(PROMPT_HIDDEN, { tabId });
    },
    getVisibleOrigin() {
      return visible;
    },
  };
};
