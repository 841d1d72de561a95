import type { ConsumerHandle, FrameWalker } from "../negotiator/types.js";
import type { OriginKey } from "../origin/originKey.js";

/**
 * In-memory frame tree for hosts that mirror their document tree into plain objects.
 * `geolocation` is absent until the document creates its location object.
 */
export type FrameNode = {
  origin: OriginKey;
  geolocation?: ConsumerHandle | null;
  children: FrameNode[];
};

/**
 * Pre-order traversal: a frame, then its subframes left to right, then its next sibling.
 */
export const frameTreeWalker: FrameWalker<FrameNode> = {
  forEachConsumer(root, fn) {
    const stack: FrameNode[] = [root];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      fn(frame.origin, frame.geolocation);
      for (let i = frame.children.length - 1; i >= 0; i -= 1) {
        const child = frame.children[i];
        if (child) stack.push(child);
      }
    }
  },
};

export const createFrame = (origin: OriginKey, options: Partial<Omit<FrameNode, "origin">> = {}): FrameNode => ({
  origin,
  children: options.children ?? [],
  ...(options.geolocation !== undefined ? { geolocation: options.geolocation } : {}),
});
