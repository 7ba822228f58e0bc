/**
 * Library exports
 *
 * Central export point for shared outcome, error and logging code.
 */

// Outcomes
export {
  SUCCESS,
  EMPTY_AGGREGATE,
  ok,
  fail,
  failure,
  isResult,
  toOutcome,
  aggregateOutcomes,
} from "./outcome.js";
export type { FailureDetail, Outcome, Result, AggregateOutcome } from "./outcome.js";

// Errors
export {
  DispatchError,
  ValidationError,
  CompileError,
  BuildError,
  DependencyResolutionError,
  HandlerFault,
  describeError,
} from "./errors.js";
export type { DispatchErrorCode } from "./errors.js";

// Logging
export { logger, createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
