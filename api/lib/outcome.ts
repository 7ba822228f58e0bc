/**
 * Outcome Types
 *
 * The uniform result every handler is coerced to, and the aggregate a
 * dispatch call returns after running all matched handlers.
 */

/**
 * Anything a handler can report as a failure.
 * Plain `{ message }` objects and Error instances both qualify.
 */
export interface FailureDetail {
  readonly message: string;
}

/**
 * Result of running one handler.
 */
export type Outcome =
  | { readonly isSuccess: true }
  | { readonly isSuccess: false; readonly detail: FailureDetail };

/**
 * Success/failure payload a handler may return.
 * The success value is carried for the handler's own callers and is
 * discarded once the result crosses the invoker boundary.
 */
export type Result<T = void, E extends FailureDetail = FailureDetail> =
  | { readonly isSuccess: true; readonly value: T }
  | { readonly isSuccess: false; readonly error: E };

/**
 * Combined result of every handler matched for one event.
 * `isSuccess` is true exactly when `failures` is empty.
 */
export interface AggregateOutcome {
  readonly isSuccess: boolean;
  readonly failures: readonly FailureDetail[];
}

export const SUCCESS: Outcome = Object.freeze({ isSuccess: true });

export const EMPTY_AGGREGATE: AggregateOutcome = Object.freeze({
  isSuccess: true,
  failures: Object.freeze([]),
});

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok(value?: unknown): Result<unknown> {
  return { isSuccess: true, value };
}

export function fail<E extends FailureDetail>(error: E): Result<never, E>;
export function fail(message: string): Result<never>;
export function fail(error: string | FailureDetail): Result<never> {
  return {
    isSuccess: false,
    error: typeof error === "string" ? { message: error } : error,
  };
}

export function failure(detail: FailureDetail): Outcome {
  return { isSuccess: false, detail };
}

/**
 * Check that a value has the runtime shape of a {@link Result}.
 * A failed result must carry an error with a string message.
 */
export function isResult(value: unknown): value is Result<unknown> {
  if (typeof value !== "object" || value === null || !("isSuccess" in value)) {
    return false;
  }
  if (value.isSuccess === true) {
    return true;
  }
  if (value.isSuccess !== false || !("error" in value)) {
    return false;
  }
  const error = value.error;
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  );
}

/** Drop a result's success value and keep its failure payload as-is. */
export function toOutcome(result: Result<unknown>): Outcome {
  return result.isSuccess ? SUCCESS : failure(result.error);
}

export function aggregateOutcomes(outcomes: readonly Outcome[]): AggregateOutcome {
  const failures: FailureDetail[] = [];
  for (const outcome of outcomes) {
    if (!outcome.isSuccess) {
      failures.push(outcome.detail);
    }
  }

  if (failures.length === 0) {
    return EMPTY_AGGREGATE;
  }

  return { isSuccess: false, failures };
}
