// pattern: Functional Core

import {
  BuildFailure,
  ConfigurationError,
  EnvironmentLoadError,
  type ExitCode,
  ExitCodes,
  HermeticityViolation,
  SealcheckError,
  SmokeTestFailure,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "hermeticity"
    | "environment"
    | "build"
    | "smoke-test"
    | "configuration"
    | "validation"
    | "filesystem"
    | "network"
    | "unknown";
  exitCode: ExitCode;
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
  /** Output of the failed tool, to be printed unmodified */
  toolOutput?: string;
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * Typed sealcheck errors map to their own category and exit code; anything
 * else is classified by its message and exits with the generic code.
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof SealcheckError) {
    const errorMessage = error.message;

    if (error instanceof HermeticityViolation) {
      return {
        category: "hermeticity",
        exitCode: error.exitCode,
        userMessage: `Hermeticity violation: ${errorMessage}`,
        technicalMessage: errorMessage,
        suggestions: [
          "Run the verification inside a container or namespace without outbound network access",
          "Enable the sandbox (--sandbox) to run the build in a network-less bubblewrap namespace",
          `Point --probe-url at a host the build could otherwise reach if ${error.url} is not representative`,
        ],
      };
    }

    if (error instanceof EnvironmentLoadError) {
      const suggestions = [
        "Run the dependency prefetch step before verifying the build",
        "Check the environment.file setting or the --env-file flag",
      ];
      if (error.line !== undefined) {
        suggestions.push(
          `Fix line ${error.line} of ${error.filePath}; each line must be KEY=VALUE`
        );
      }

      return {
        category: "environment",
        exitCode: error.exitCode,
        userMessage: `Environment load error: ${errorMessage}`,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof BuildFailure) {
      return {
        category: "build",
        exitCode: error.exitCode,
        userMessage: `Build failure: ${errorMessage}`,
        technicalMessage: errorMessage,
        suggestions: [
          "Check the toolchain output above for the first error",
          "A dependency missing from the prefetched cache means the build tried to resolve it from the network",
        ],
        ...(error.toolOutput !== undefined && { toolOutput: error.toolOutput }),
      };
    }

    if (error instanceof SmokeTestFailure) {
      return {
        category: "smoke-test",
        exitCode: error.exitCode,
        userMessage: `Smoke test failure: ${errorMessage}`,
        technicalMessage: errorMessage,
        suggestions: [
          `Run ${error.artifactPath} by hand with the smoke test arguments`,
          "Check smokeTest.args if the program has no --help flag",
        ],
        ...(error.toolOutput !== undefined && { toolOutput: error.toolOutput }),
      };
    }

    if (error instanceof ValidationError) {
      const suggestions = [
        "Check your configuration file against `sealcheck schema`",
      ];
      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }

      return {
        category: "validation",
        exitCode: error.exitCode,
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof ConfigurationError) {
      return {
        category: "configuration",
        exitCode: error.exitCode,
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          "Check your sealcheck.yaml file for errors",
          "Run with --log-level debug for more detailed information",
        ],
      };
    }

    return {
      category: "unknown",
      exitCode: error.exitCode,
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: ["Run with --log-level debug for more information"],
    };
  }

  // Fall back to string-based analysis for untyped errors
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      exitCode: ExitCodes.UNKNOWN,
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the output directory",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      exitCode: ExitCodes.UNKNOWN,
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
    };
  }

  if (errorString.includes("eisdir")) {
    return {
      category: "filesystem",
      exitCode: ExitCodes.UNKNOWN,
      userMessage: "Expected a file but found a directory",
      technicalMessage: errorMessage,
      suggestions: ["Check the file path is correct"],
    };
  }

  if (
    errorString.includes("econnrefused") ||
    errorString.includes("etimedout") ||
    errorString.includes("getaddrinfo")
  ) {
    return {
      category: "network",
      exitCode: ExitCodes.UNKNOWN,
      userMessage: "A network operation failed",
      technicalMessage: errorMessage,
      suggestions: [
        "sealcheck only uses the network for the isolation probe; report this with --log-level debug output",
      ],
    };
  }

  if (errorString.includes("invalid") || errorString.includes("validation")) {
    return {
      category: "validation",
      exitCode: ExitCodes.CONFIGURATION,
      userMessage: "Configuration or input validation failed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the command arguments and your configuration file",
        "Run `sealcheck schema` to see the configuration format",
      ],
    };
  }

  return {
    category: "unknown",
    exitCode: ExitCodes.UNKNOWN,
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Check the command syntax and arguments",
      "Run with --log-level debug for more detailed information",
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
