import type { z } from "zod";
import type {
  CancellationSlot,
  EventPayload,
  EventType,
  HandlerDefinition,
  HandlerReturn,
  ReturnShape,
  ServiceToken,
  Slot,
  SlotValues,
} from "./types.js";

/**
 * Declare an event type. The schema narrows raw transport payloads
 * before any handler sees them.
 *
 * @example
 * ```ts
 * const MessageCreated = defineEvent("message.created", z.object({ content: z.string() }));
 * ```
 */
export function defineEvent<TName extends string, TSchema extends z.ZodTypeAny>(
  name: TName,
  schema: TSchema,
): EventType<TName, TSchema> {
  const eventType: EventType<TName, TSchema> = { kind: "event-type", name, schema };
  return Object.freeze(eventType);
}

/**
 * Declare a dependency the resolver can supply to handlers.
 */
export function createToken<T>(description: string): ServiceToken<T> {
  const token: ServiceToken<T> = { kind: "service", key: Symbol(description), description };
  return Object.freeze(token);
}

const cancellation: CancellationSlot = { kind: "cancellation" };

/** Marks the parameter that receives the dispatch's AbortSignal. Must come last. */
export const CANCELLATION = Object.freeze(cancellation);

export function isServiceToken(slot: unknown): slot is ServiceToken<unknown> {
  return (
    typeof slot === "object" &&
    slot !== null &&
    "kind" in slot &&
    slot.kind === "service" &&
    "key" in slot &&
    typeof slot.key === "symbol"
  );
}

export function isCancellationSlot(slot: unknown): slot is CancellationSlot {
  return slot === CANCELLATION;
}

export function isEventType(value: unknown): value is EventType {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "event-type" &&
    "name" in value &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    "schema" in value
  );
}

interface HandlerOptions<
  TEvent extends EventType,
  TSlots extends readonly Slot[],
  R extends ReturnShape,
  A extends boolean,
> {
  name: string;
  /** Parameters after the event, in order. Defaults to none. */
  inject?: TSlots;
  /** Defaults to "void". */
  returns?: R;
  /** Defaults to false. */
  async?: A;
  handle: (event: EventPayload<TEvent>, ...args: SlotValues<TSlots>) => HandlerReturn<R, A>;
}

/**
 * Describe a handler together with the shape of its parameters and return
 * value. The types of `handle` follow from `event`, `inject`, `returns` and
 * `async`, so the declaration and the function cannot disagree.
 *
 * @example
 * ```ts
 * const greet = defineHandler(MessageCreated, {
 *   name: "greet",
 *   inject: [Greeter, CANCELLATION],
 *   async: true,
 *   handle: async (message, greeter, signal) => {
 *     await greeter.greet(message.content, signal);
 *   },
 * });
 * ```
 */
export function defineHandler<
  TEvent extends EventType,
  const TSlots extends readonly Slot[] = [],
  R extends ReturnShape = "void",
  A extends boolean = false,
>(
  event: TEvent,
  options: HandlerOptions<TEvent, TSlots, R, A>,
): HandlerDefinition<TEvent, TSlots, R, A> {
  const definition: HandlerDefinition<TEvent, TSlots, R, A> = {
    event,
    name: options.name,
    inject: options.inject ?? [],
    returns: options.returns ?? "void",
    async: options.async ?? false,
    handle: options.handle,
  };
  return Object.freeze(definition);
}
