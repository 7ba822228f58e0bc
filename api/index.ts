/**
 * Delegate Dispatch
 *
 * Register plain functions as event handlers, declare what they need, and
 * dispatch events to all of them with one uniform outcome.
 */

export * from "./lib/index.js";

// Configuration
export {
  CONFIG_BOUNDS,
  DEFAULT_EXECUTION_MODE,
  ENV_VARS,
  ExecutionModeSchema,
  loadDispatchConfig,
} from "./config.js";
export type { DispatchConfig, ExecutionMode } from "./config.js";

// Declarations
export { defineEvent, defineHandler, createToken, CANCELLATION } from "./handlers/definitions.js";
export type {
  EventType,
  EventPayload,
  IncomingEvent,
  ServiceToken,
  CancellationSlot,
  Slot,
  ReturnShape,
  HandlerDefinition,
  RegisteredHandler,
  HandlerDescriptor,
  DependencyResolver,
  Invoker,
} from "./handlers/types.js";

// Registration, compilation, dispatch
export { HandlerRegistry, createHandlerRegistry } from "./handlers/registry.js";
export type { HandlerRegistryOptions } from "./handlers/registry.js";
export { compileHandler } from "./handlers/compiler.js";
export type { CompileOptions } from "./handlers/compiler.js";
export { buildDispatchTable } from "./handlers/dispatch-table.js";
export type { DispatchTable, BuildOptions } from "./handlers/dispatch-table.js";
export { Dispatcher, createDispatcher, attachDispatcher } from "./handlers/dispatcher.js";
export type { DispatcherOptions, EventSource, AttachOptions } from "./handlers/dispatcher.js";
export { StaticResolver, createStaticResolver } from "./handlers/resolver.js";
export { createDelegateDispatch } from "./handlers/setup.js";
export type { DelegateDispatchOptions } from "./handlers/setup.js";
