// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * Failures are logged as the analysed user message followed by suggestions;
 * technical details and the stack only appear at debug level. The process
 * exit code is set to 1 and the logger flushed, so pending output is not cut
 * off by an abrupt exit.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      // Multi-line messages (connection remediation) are logged line by line
      for (const line of analyzed.userMessage.split("\n")) {
        CLI_LOGGER.error(line);
      }

      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(`Error category: ${analyzed.category}`);
        CLI_LOGGER.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          CLI_LOGGER.debug(error.stack);
        }
      }

      CLI_LOGGER.flush();
      process.exitCode = 1;
    }
  };
}
