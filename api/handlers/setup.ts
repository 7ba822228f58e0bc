import type { DispatchConfig } from "../config.js";
import type { Logger } from "../lib/logger.js";
import { buildDispatchTable } from "./dispatch-table.js";
import { Dispatcher } from "./dispatcher.js";
import { HandlerRegistry } from "./registry.js";
import type { DependencyResolver } from "./types.js";

export interface DelegateDispatchOptions {
  resolver: DependencyResolver;
  /** Register every handler here. The registry is sealed once this returns. */
  configure: (registry: HandlerRegistry) => void;
  logger?: Logger;
  config?: Partial<DispatchConfig>;
}

/**
 * Wire registry, table and dispatcher in one step.
 *
 * Throws synchronously (ValidationError or BuildError) when any handler is
 * misconfigured, so a host calling this during startup never begins
 * accepting events in a broken state.
 */
export function createDelegateDispatch(options: DelegateDispatchOptions): Dispatcher {
  const registry = new HandlerRegistry({ logger: options.logger });
  options.configure(registry);

  const table = buildDispatchTable(registry, options.resolver, { logger: options.logger });

  return new Dispatcher({
    table,
    resolver: options.resolver,
    logger: options.logger,
    config: options.config,
  });
}
