/**
 * Dispatch Errors
 *
 * Configuration errors (validation, compile, build) are thrown and must
 * stop startup. Runtime errors (resolution misses, handler faults) are
 * turned into failure details by the invoker and never escape dispatch.
 */

export type DispatchErrorCode =
  | "validation"
  | "compile"
  | "build"
  | "resolution"
  | "handler_fault";

/**
 * Base class for every error raised by the dispatch engine.
 */
export abstract class DispatchError extends Error {
  abstract readonly code: DispatchErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A handler was rejected at registration.
 */
export class ValidationError extends DispatchError {
  readonly code = "validation";
  readonly handlerName: string | undefined;

  constructor(message: string, handlerName?: string) {
    super(handlerName ? `${message} (handler "${handlerName}")` : message);
    this.handlerName = handlerName;
  }
}

/**
 * A validated handler cannot be turned into an invoker.
 */
export class CompileError extends DispatchError {
  readonly code = "compile";
  readonly handlerName: string;
  readonly eventName: string;

  constructor(message: string, handlerName: string, eventName: string) {
    super(`Cannot compile handler "${handlerName}" for ${eventName}: ${message}`);
    this.handlerName = handlerName;
    this.eventName = eventName;
  }
}

/**
 * The dispatch table could not be built. The offending CompileError is the cause.
 */
export class BuildError extends DispatchError {
  readonly code = "build";

  constructor(cause: CompileError) {
    super(`Dispatch table build aborted: ${cause.message}`, { cause });
  }
}

/**
 * The resolver had no instance for a dependency slot while an event was
 * being dispatched.
 */
export class DependencyResolutionError extends DispatchError {
  readonly code = "resolution";
  readonly serviceName: string;

  constructor(serviceName: string, handlerName: string) {
    super(`No provider for "${serviceName}" requested by handler "${handlerName}"`);
    this.serviceName = serviceName;
  }
}

/**
 * A handler threw or rejected instead of returning a failure result.
 * Carried as a failure detail in the aggregate outcome.
 */
export class HandlerFault extends DispatchError {
  readonly code = "handler_fault";
  readonly handlerName: string;
  readonly eventName: string;

  constructor(handlerName: string, eventName: string, cause: unknown) {
    super(`Handler "${handlerName}" failed on ${eventName}: ${describeError(cause)}`, { cause });
    this.handlerName = handlerName;
    this.eventName = eventName;
  }
}

/**
 * Render any thrown value as a one-line description.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
