/**
 * Dispatch Configuration
 *
 * Process-wide defaults for the dispatcher, read from environment
 * variables. Options passed to a Dispatcher override these.
 */

import { z } from "zod";

// ───────────────────────────────────────────────────────────────────────────────
// Configuration Boundaries
// ───────────────────────────────────────────────────────────────────────────────

export const CONFIG_BOUNDS = {
  slowHandlerMs: {
    min: 0, // 0 disables the warning
    max: 10 * 60 * 1000, // 10 minutes
    default: 5_000,
  },
} as const;

// ───────────────────────────────────────────────────────────────────────────────
// Execution Mode
// ───────────────────────────────────────────────────────────────────────────────

/**
 * How the invokers matched for one event are run.
 * - sequential: one after another, in registration order
 * - parallel: all at once, failures still reported in registration order
 */
export const ExecutionModeSchema = z.enum(["sequential", "parallel"]);

export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const DEFAULT_EXECUTION_MODE: ExecutionMode = "sequential";

export interface DispatchConfig {
  executionMode: ExecutionMode;
  /** Handlers running at least this long are logged as slow. */
  slowHandlerMs: number;
}

export const ENV_VARS = {
  EXECUTION_MODE: "DISPATCH_EXECUTION_MODE",
  SLOW_HANDLER_MS: "DISPATCH_SLOW_HANDLER_MS",
} as const;

const parseIntWithBounds = (
  envVar: string | undefined,
  defaultValue: number,
  min: number,
  max: number
): number => {
  const value = parseInt(envVar ?? "", 10);
  if (Number.isNaN(value)) {
    return defaultValue;
  }
  return Math.max(min, Math.min(max, value));
};

const parseExecutionMode = (envVar: string | undefined): ExecutionMode => {
  const parsed = ExecutionModeSchema.safeParse(envVar?.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_EXECUTION_MODE;
};

/**
 * Read dispatch configuration from the environment.
 * Invalid or missing values fall back to defaults; numbers are clamped.
 */
export function loadDispatchConfig(env: NodeJS.ProcessEnv = process.env): DispatchConfig {
  return {
    executionMode: parseExecutionMode(env[ENV_VARS.EXECUTION_MODE]),
    slowHandlerMs: parseIntWithBounds(
      env[ENV_VARS.SLOW_HANDLER_MS],
      CONFIG_BOUNDS.slowHandlerMs.default,
      CONFIG_BOUNDS.slowHandlerMs.min,
      CONFIG_BOUNDS.slowHandlerMs.max
    ),
  };
}
