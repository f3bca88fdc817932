// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Reports an error the way every command does, then exits with its code.
 * Also used for errors raised outside an action, such as in the preAction hook.
 */
export function reportCliError(error: unknown): void {
  const isDebugMode = CLI_LOGGER.isLevelEnabled("debug");

  const analyzed = analyzeError(error);

  // Tool output goes first so the summary below is the last thing on screen
  if (analyzed.toolOutput) {
    process.stderr.write(
      analyzed.toolOutput.endsWith("\n")
        ? analyzed.toolOutput
        : `${analyzed.toolOutput}\n`
    );
  }

  CLI_LOGGER.error(analyzed.userMessage);

  analyzed.suggestions.forEach(suggestion => {
    CLI_LOGGER.error(`  • ${suggestion}`);
  });

  if (isDebugMode) {
    CLI_LOGGER.debug("Technical error details:");
    CLI_LOGGER.debug(analyzed.technicalMessage);
    if (error instanceof Error && error.stack) {
      CLI_LOGGER.debug("Stack trace:");
      CLI_LOGGER.debug(error.stack);
    }
    CLI_LOGGER.debug(
      { category: analyzed.category, exitCode: analyzed.exitCode },
      "Full error analysis"
    );
  }

  // Ensure logs are flushed before exit
  CLI_LOGGER.flush();

  setTimeout(() => {
    process.exit(analyzed.exitCode);
  }, 100);
}

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * This HOF provides centralized error handling for CLI commands by:
 * 1. Catching all errors from wrapped actions
 * 2. Printing the failed tool's own output unmodified
 * 3. Using the error analysis utility to provide user-friendly error messages
 * 4. Exiting with the code of the error's class
 *
 * @param action The action function to wrap with error handling
 * @returns Wrapped action function with consistent error handling
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      reportCliError(error);
    }
  };
}
