export type TopicKind = "event" | "state";

export type Unsubscribe = () => void;

// Bivariant so Topic<SpecificPayload> can be stored as Topic<unknown> in listener maps.
export type IsEqual<Payload> = {
  bivarianceHack(prev: Payload, next: Payload): boolean;
}["bivarianceHack"];

export type Validate<Payload> = {
  bivarianceHack(value: unknown): value is Payload;
}["bivarianceHack"];

export type Topic<Payload, Name extends string = string> = {
  name: Name;
  kind: TopicKind;

  /**
   * Whether the last payload is kept as a snapshot.
   * State topics remember by default, event topics do not.
   */
  remember: boolean;

  /**
   * Dedupe check for remembered topics. Falls back to Object.is.
   */
  isEqual?: IsEqual<Payload>;

  validate?: Validate<Payload>;
};

export type PayloadOfTopic<T> = T extends Topic<infer P, string> ? P : never;

export const eventTopic = <Payload, const Name extends string = string>(
  name: Name,
  opts: { validate?: Validate<Payload> } = {},
): Topic<Payload, Name> => ({
  name,
  kind: "event",
  remember: false,
  ...(opts.validate ? { validate: opts.validate } : {}),
});

export const stateTopic = <Payload, const Name extends string = string>(
  name: Name,
  opts: { isEqual?: IsEqual<Payload>; validate?: Validate<Payload> } = {},
): Topic<Payload, Name> => ({
  name,
  kind: "state",
  remember: true,
  ...(opts.isEqual ? { isEqual: opts.isEqual } : {}),
  ...(opts.validate ? { validate: opts.validate } : {}),
});
