import { BuildError, CompileError } from "../lib/errors.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import { compileHandler } from "./compiler.js";
import type { HandlerRegistry } from "./registry.js";
import type { DependencyResolver, Invoker } from "./types.js";

/**
 * Immutable mapping from event name to the invokers registered for it,
 * in registration order. Event names without handlers have no entry.
 */
export interface DispatchTable {
  readonly size: number;
  invokersFor(eventName: string): readonly Invoker[];
  has(eventName: string): boolean;
  eventNames(): string[];
}

export interface BuildOptions {
  logger?: Logger;
}

const NO_INVOKERS: readonly Invoker[] = Object.freeze([]);

class FrozenDispatchTable implements DispatchTable {
  constructor(private readonly entries: ReadonlyMap<string, readonly Invoker[]>) {}

  get size(): number {
    return this.entries.size;
  }

  invokersFor(eventName: string): readonly Invoker[] {
    return this.entries.get(eventName) ?? NO_INVOKERS;
  }

  has(eventName: string): boolean {
    return this.entries.has(eventName);
  }

  eventNames(): string[] {
    return Array.from(this.entries.keys());
  }
}

/**
 * Seal the registry and compile every registered handler exactly once.
 *
 * Must run before any event is accepted: it is where unresolvable
 * dependencies surface. The first compile failure aborts the build and no
 * table is returned.
 *
 * @throws BuildError wrapping the CompileError that stopped the build
 */
export function buildDispatchTable(
  registry: HandlerRegistry,
  resolver: DependencyResolver,
  options: BuildOptions = {},
): DispatchTable {
  const logger = options.logger ?? defaultLogger;
  registry.seal();

  const grouped = new Map<string, Invoker[]>();
  const descriptors = registry.descriptors();

  logger.group(`Building dispatch table (${descriptors.length} handler(s))`);
  try {
    for (const descriptor of descriptors) {
      let invoker: Invoker;
      try {
        invoker = compileHandler(descriptor, resolver, { logger });
      } catch (error) {
        if (error instanceof CompileError) {
          logger.error("Dispatch table build failed", error);
          throw new BuildError(error);
        }
        throw error;
      }

      const invokers = grouped.get(invoker.eventName) ?? [];
      invokers.push(invoker);
      grouped.set(invoker.eventName, invokers);
    }
  } finally {
    logger.groupEnd();
  }

  const entries = new Map<string, readonly Invoker[]>();
  for (const [eventName, invokers] of grouped) {
    entries.set(eventName, Object.freeze(invokers));
    logger.debug(`[${eventName}] ${invokers.length} handler(s): ${invokers.map((i) => i.handlerName).join(", ")}`);
  }

  logger.info(`Dispatch table ready: ${descriptors.length} handler(s) across ${entries.size} event type(s)`);
  return Object.freeze(new FrozenDispatchTable(entries));
}
