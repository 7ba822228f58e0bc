import type { z } from "zod";
import type { Outcome, Result } from "../lib/outcome.js";

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dispatch key for one concrete event shape.
 * Created with `defineEvent`; its name must be unique within a registry.
 */
export interface EventType<
  TName extends string = string,
  TSchema extends z.ZodTypeAny = z.ZodTypeAny,
> {
  readonly kind: "event-type";
  readonly name: TName;
  readonly schema: TSchema;
}

export type EventPayload<TEvent extends EventType> = z.output<TEvent["schema"]>;

/**
 * Event as delivered by a transport.
 */
export interface IncomingEvent {
  name: string;
  payload: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parameter slots
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Key a dependency slot asks the resolver for.
 * `T` only exists at compile time and types the matching handler parameter.
 */
export interface ServiceToken<T> {
  readonly kind: "service";
  readonly key: symbol;
  readonly description: string;
  readonly _type?: T;
}

export interface CancellationSlot {
  readonly kind: "cancellation";
}

export type Slot = ServiceToken<unknown> | CancellationSlot;

/** Handler parameter types produced by a slot list. */
export type SlotValues<TSlots extends readonly Slot[]> = {
  [K in keyof TSlots]: TSlots[K] extends ServiceToken<infer T>
    ? T
    : TSlots[K] extends CancellationSlot
      ? AbortSignal
      : never;
};

// ─────────────────────────────────────────────────────────────────────────────
// Return shapes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * - void: nothing useful is returned
 * - signal: a plain `true` success signal
 * - result: a `Result` success/failure payload
 * - auto: a `Result` is projected, anything else counts as success
 *   (what bare functions get)
 */
export type ReturnShape = "void" | "signal" | "result" | "auto";

// A synchronous void handler must return undefined, not a promise.
type SyncReturn<R extends ReturnShape> = R extends "void"
  ? undefined
  : R extends "signal"
    ? true
    : R extends "result"
      ? Result<unknown>
      : unknown;

type AsyncReturn<R extends ReturnShape> = R extends "void" ? void : SyncReturn<R>;

export type HandlerReturn<R extends ReturnShape, A extends boolean> = A extends true
  ? Promise<AsyncReturn<R>>
  : SyncReturn<R>;

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Handler callable with its types erased. Only ever invoked through
 * Reflect.apply with an argument list assembled from its slots.
 */
export type ErasedHandler = (...args: never[]) => unknown;

/**
 * A handler with its parameter shape and return shape declared next to it.
 */
export interface HandlerDefinition<
  TEvent extends EventType = EventType,
  TSlots extends readonly Slot[] = readonly Slot[],
  R extends ReturnShape = ReturnShape,
  A extends boolean = boolean,
> {
  readonly event: TEvent;
  readonly name: string;
  readonly inject: readonly Slot[];
  readonly returns: ReturnShape;
  readonly async: boolean;
  readonly handle: (event: EventPayload<TEvent>, ...args: SlotValues<TSlots>) => HandlerReturn<R, A>;
}

/**
 * Any `HandlerDefinition` for `TEvent`, seen without its slot and return types.
 */
export interface ErasedHandlerDefinition<TEvent extends EventType> {
  readonly event: TEvent;
  readonly name: string;
  readonly inject: readonly Slot[];
  readonly returns: ReturnShape;
  readonly async: boolean;
  readonly handle: ErasedHandler;
}

/**
 * What `register` accepts: a definition for `TEvent`, or a bare function
 * taking only the event.
 */
export type RegisteredHandler<TEvent extends EventType> =
  | ErasedHandlerDefinition<TEvent>
  | ((event: EventPayload<TEvent>) => unknown);

/**
 * Validated, frozen metadata for one registered handler.
 */
export interface HandlerDescriptor {
  readonly eventType: EventType;
  readonly name: string;
  readonly slots: readonly Slot[];
  readonly returns: ReturnShape;
  readonly async: boolean;
  readonly handle: ErasedHandler;
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution & invocation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * External source of handler dependencies.
 * `resolve` returns undefined when nothing is provided for the token.
 */
export interface DependencyResolver {
  has(token: ServiceToken<unknown>): boolean;
  resolve(token: ServiceToken<unknown>): unknown;
}

/**
 * Compiled adapter for one handler descriptor.
 * Never rejects: handler faults come back as failed outcomes.
 */
export interface Invoker {
  (event: IncomingEvent, resolver: DependencyResolver, signal: AbortSignal): Promise<Outcome>;
  readonly handlerName: string;
  readonly eventName: string;
}
