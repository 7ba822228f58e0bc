import { CompileError, DependencyResolutionError, HandlerFault } from "../lib/errors.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import { SUCCESS, failure, isResult, toOutcome, type Outcome } from "../lib/outcome.js";
import type {
  DependencyResolver,
  HandlerDescriptor,
  IncomingEvent,
  Invoker,
  ReturnShape,
} from "./types.js";

/**
 * Adapter Compiler
 *
 * Turns a validated HandlerDescriptor into an Invoker with one calling
 * convention: (event, resolver, signal) => Promise<Outcome>.
 *
 * Everything that depends only on the descriptor (how arguments are bound,
 * how the return value is coerced) is decided here, once. The invoker
 * itself just runs the plan.
 */

type Coercion = (raw: unknown) => Outcome | Promise<Outcome>;

type ArgumentBinder = (resolver: DependencyResolver, signal: AbortSignal) => unknown;

export interface CompileOptions {
  logger?: Logger;
}

function projectResult(raw: unknown, handlerName: string): Outcome {
  if (!isResult(raw)) {
    throw new TypeError(
      `Handler "${handlerName}" declares a result return but produced ${raw === null ? "null" : typeof raw}`,
    );
  }
  return toOutcome(raw);
}

function projectIfResult(raw: unknown): Outcome {
  return isResult(raw) ? toOutcome(raw) : SUCCESS;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" && value !== null && "then" in value && typeof value.then === "function"
  );
}

/**
 * A handler declared synchronous returned a promise anyway. It is awaited
 * before the invoker settles: a rejection is the fault, and so is fulfilment.
 */
async function settleUndeclaredPromise(pending: PromiseLike<unknown>, handlerName: string): Promise<never> {
  await pending;
  throw new TypeError(`Handler "${handlerName}" is declared synchronous but returned a promise`);
}

/**
 * Pick the coercion for a declared return shape.
 * void and signal values are ignored once the call (or its promise) completes.
 */
function selectCoercion(returns: ReturnShape, isAsync: boolean, handlerName: string): Coercion {
  const project = selectProjection(returns, handlerName);
  if (isAsync) {
    return async (raw) => project(await raw);
  }
  return (raw) => (isThenable(raw) ? settleUndeclaredPromise(raw, handlerName) : project(raw));
}

function selectProjection(returns: ReturnShape, handlerName: string): (value: unknown) => Outcome {
  switch (returns) {
    case "void":
    case "signal":
      return () => SUCCESS;
    case "result":
      return (value) => projectResult(value, handlerName);
    case "auto":
      return projectIfResult;
  }
}

function createArgumentBinders(
  descriptor: HandlerDescriptor,
  resolver: DependencyResolver,
): ArgumentBinder[] {
  const { name, eventType } = descriptor;

  return descriptor.slots.map((slot, index): ArgumentBinder => {
    if (slot.kind === "cancellation") {
      return (_resolver, signal) => signal;
    }

    if (!resolver.has(slot)) {
      throw new CompileError(
        `no provider for "${slot.description}" (parameter ${index + 2})`,
        name,
        eventType.name,
      );
    }

    return (callResolver) => {
      const value = callResolver.resolve(slot);
      if (value === undefined) {
        throw new DependencyResolutionError(slot.description, name);
      }
      return value;
    };
  });
}

/**
 * Compile a descriptor into an invoker.
 *
 * `resolver` is consulted now only to check that every dependency slot can
 * be satisfied; instances are resolved again on every call.
 *
 * @throws CompileError if a dependency slot has no provider
 */
export function compileHandler(
  descriptor: HandlerDescriptor,
  resolver: DependencyResolver,
  options: CompileOptions = {},
): Invoker {
  const logger = options.logger ?? defaultLogger;
  const { eventType, name, handle } = descriptor;
  const coerce = selectCoercion(descriptor.returns, descriptor.async, name);
  const binders = createArgumentBinders(descriptor, resolver);

  const invoke = async (
    event: IncomingEvent,
    callResolver: DependencyResolver,
    signal: AbortSignal,
  ): Promise<Outcome> => {
    try {
      const narrowed = eventType.schema.safeParse(event.payload);
      if (!narrowed.success) {
        logger.debug(
          `[${eventType.name}] Skipping handler "${name}": payload does not match the event schema`,
        );
        return SUCCESS;
      }

      const args: unknown[] = [narrowed.data];
      for (const bind of binders) {
        args.push(bind(callResolver, signal));
      }

      return await coerce(Reflect.apply(handle, undefined, args));
    } catch (error) {
      return failure(new HandlerFault(name, eventType.name, error));
    }
  };

  return Object.assign(invoke, { handlerName: name, eventName: eventType.name });
}
