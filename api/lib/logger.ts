/**
 * Logging Abstraction
 *
 * Dispatch runs inside long-lived services and inside CI jobs:
 * - GitHub Actions (uses @actions/core, so faults show up as annotations)
 * - Everywhere else (uses console)
 */

import * as core from "@actions/core";

const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

const isDebugEnabled = (): boolean => {
  const value = process.env.DISPATCH_DEBUG;
  return value !== undefined && value !== "" && value !== "0" && value.toLowerCase() !== "false";
};

/**
 * Logger used by the registry, table build and dispatcher.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
}

class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warn(message: string): void {
    core.warning(message);
  }

  error(message: string, error?: Error): void {
    if (!error) {
      core.error(message);
      return;
    }
    core.error(`${message}: ${error.message}`);
    if (error.stack) {
      core.debug(error.stack);
    }
  }

  debug(message: string): void {
    core.debug(message);
  }

  group(name: string): void {
    core.startGroup(name);
  }

  groupEnd(): void {
    core.endGroup();
  }
}

class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled: boolean) {}

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`[warn] ${message}`);
  }

  error(message: string, error?: Error): void {
    if (error) {
      console.error(`[error] ${message}:`, error);
    } else {
      console.error(`[error] ${message}`);
    }
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(`[debug] ${message}`);
    }
  }

  group(name: string): void {
    console.group(name);
  }

  groupEnd(): void {
    console.groupEnd();
  }
}

/**
 * Logger that drops everything. For hosts that route outcomes elsewhere.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  group: () => {},
  groupEnd: () => {},
};

/**
 * Create the appropriate logger for the current environment.
 */
export function createLogger(): Logger {
  return isGitHubActions() ? new ActionsLogger() : new ConsoleLogger(isDebugEnabled());
}

export const logger = createLogger();
