import { loadDispatchConfig, type DispatchConfig, type ExecutionMode } from "../config.js";
import { HandlerFault } from "../lib/errors.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import {
  EMPTY_AGGREGATE,
  aggregateOutcomes,
  type AggregateOutcome,
  type Outcome,
} from "../lib/outcome.js";
import type { DispatchTable } from "./dispatch-table.js";
import type { DependencyResolver, IncomingEvent, Invoker } from "./types.js";

/** Used when the caller does not pass a signal. Never aborts. */
const NEVER_ABORTED = new AbortController().signal;

export interface DispatcherOptions {
  table: DispatchTable;
  resolver: DependencyResolver;
  logger?: Logger;
  /** Overrides for the environment-derived configuration. */
  config?: Partial<DispatchConfig>;
}

/**
 * Runtime entry point: routes one incoming event to the invokers registered
 * for its name and folds their outcomes into one AggregateOutcome.
 *
 * Handlers run in registration order and every one of them runs, whatever
 * the ones before it returned. Cancellation is advisory: the signal is
 * handed to handlers that asked for it, but the dispatcher does not stop
 * early when it fires.
 */
export class Dispatcher {
  private readonly table: DispatchTable;
  private readonly resolver: DependencyResolver;
  private readonly logger: Logger;
  readonly executionMode: ExecutionMode;
  readonly slowHandlerMs: number;

  constructor(options: DispatcherOptions) {
    const env = loadDispatchConfig();
    this.table = options.table;
    this.resolver = options.resolver;
    this.logger = options.logger ?? defaultLogger;
    this.executionMode = options.config?.executionMode ?? env.executionMode;
    this.slowHandlerMs = options.config?.slowHandlerMs ?? env.slowHandlerMs;
  }

  /** Event names that have at least one handler. */
  eventNames(): string[] {
    return this.table.eventNames();
  }

  /**
   * Dispatch one event. Never rejects because of a handler: faults and
   * failure results are both reported through the returned outcome.
   */
  async dispatch(event: IncomingEvent, signal: AbortSignal = NEVER_ABORTED): Promise<AggregateOutcome> {
    const invokers = this.table.invokersFor(event.name);
    if (invokers.length === 0) {
      this.logger.debug(`[${event.name}] No handlers registered; skipping`);
      return EMPTY_AGGREGATE;
    }

    const outcomes =
      this.executionMode === "parallel"
        ? await this.runParallel(invokers, event, signal)
        : await this.runSequential(invokers, event, signal);

    const aggregate = aggregateOutcomes(outcomes);
    if (!aggregate.isSuccess) {
      this.logger.info(
        `[${event.name}] ${aggregate.failures.length} of ${invokers.length} handler(s) failed`,
      );
    }
    return aggregate;
  }

  private async runSequential(
    invokers: readonly Invoker[],
    event: IncomingEvent,
    signal: AbortSignal,
  ): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    for (const invoker of invokers) {
      outcomes.push(await this.runInvoker(invoker, event, signal));
    }
    return outcomes;
  }

  // Promise.all keeps results at their input index, so failures stay in
  // registration order even when handlers finish out of order.
  private runParallel(
    invokers: readonly Invoker[],
    event: IncomingEvent,
    signal: AbortSignal,
  ): Promise<Outcome[]> {
    return Promise.all(invokers.map((invoker) => this.runInvoker(invoker, event, signal)));
  }

  private async runInvoker(
    invoker: Invoker,
    event: IncomingEvent,
    signal: AbortSignal,
  ): Promise<Outcome> {
    const startedAt = Date.now();
    const outcome = await invoker(event, this.resolver, signal);
    const elapsedMs = Date.now() - startedAt;

    if (this.slowHandlerMs > 0 && elapsedMs >= this.slowHandlerMs) {
      this.logger.warn(
        `[${event.name}] Handler "${invoker.handlerName}" took ${elapsedMs}ms (threshold ${this.slowHandlerMs}ms)`,
      );
    }

    if (!outcome.isSuccess) {
      if (outcome.detail instanceof HandlerFault) {
        this.logger.error(`[${event.name}] Handler "${invoker.handlerName}" threw`, outcome.detail);
      } else {
        this.logger.debug(
          `[${event.name}] Handler "${invoker.handlerName}" returned a failure: ${outcome.detail.message}`,
        );
      }
    }

    return outcome;
  }
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  return new Dispatcher(options);
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport binding
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Anything that delivers named events to listeners: a webhook app, a
 * gateway client, an EventEmitter wrapper.
 */
export interface EventSource {
  on(event: string, listener: (raw: unknown) => Promise<void>): void;
}

export interface AttachOptions {
  /** Maps what the source emits to the event payload. Defaults to identity. */
  toPayload?: (raw: unknown, eventName: string) => unknown;
  /** Signal handed to every dispatch, e.g. aborted on shutdown. */
  signal?: AbortSignal;
  /** Receives the aggregate outcome of each dispatched event. */
  onOutcome?: (eventName: string, outcome: AggregateOutcome) => void | Promise<void>;
}

/**
 * Subscribe a dispatcher to every event name that has handlers.
 * Names without handlers get no listener.
 */
export function attachDispatcher(
  source: EventSource,
  dispatcher: Dispatcher,
  options: AttachOptions = {},
): void {
  const toPayload = options.toPayload ?? ((raw: unknown) => raw);

  for (const eventName of dispatcher.eventNames()) {
    source.on(eventName, async (raw) => {
      const outcome = await dispatcher.dispatch(
        { name: eventName, payload: toPayload(raw, eventName) },
        options.signal,
      );
      await options.onOutcome?.(eventName, outcome);
    });
  }
}
