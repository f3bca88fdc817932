// pattern: Functional Core

/**
 * Exit codes reported by the CLI, one per failure class
 */
export const ExitCodes = {
  SUCCESS: 0,
  UNKNOWN: 1,
  CONFIGURATION: 2,
  HERMETICITY_VIOLATION: 10,
  ENVIRONMENT_LOAD: 11,
  BUILD_FAILURE: 12,
  SMOKE_TEST_FAILURE: 13,
} as const;
export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Base class for sealcheck application errors
 * Subclasses pin the category and the process exit code
 */
export abstract class SealcheckError extends Error {
  public readonly category: string;
  public readonly exitCode: ExitCode;

  protected constructor(category: string, exitCode: ExitCode, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;
    this.exitCode = exitCode;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to configuration files and CLI overrides
 */
export class ConfigurationError extends SealcheckError {
  public readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super("configuration", ExitCodes.CONFIGURATION, message);
    if (configPath) {
      this.configPath = configPath;
    }
  }
}

/**
 * Errors related to schema validation failures
 */
export class ValidationError extends SealcheckError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", ExitCodes.CONFIGURATION, message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * The sandbox could reach the network when it must not
 */
export class HermeticityViolation extends SealcheckError {
  public readonly url: string;
  public readonly status: number;

  constructor(message: string, url: string, status: number) {
    super("hermeticity", ExitCodes.HERMETICITY_VIOLATION, message);
    this.url = url;
    this.status = status;
  }
}

/**
 * The prefetched environment file is missing, unreadable or malformed
 */
export class EnvironmentLoadError extends SealcheckError {
  public readonly filePath: string;
  public readonly line?: number;

  constructor(message: string, filePath: string, line?: number) {
    super("environment", ExitCodes.ENVIRONMENT_LOAD, message);
    this.filePath = filePath;
    if (line !== undefined) {
      this.line = line;
    }
  }
}

/**
 * The toolchain build failed or did not produce an executable artifact
 */
export class BuildFailure extends SealcheckError {
  public readonly toolExitCode?: number;
  public readonly toolOutput?: string;

  constructor(message: string, toolOutput?: string, toolExitCode?: number) {
    super("build", ExitCodes.BUILD_FAILURE, message);
    if (toolOutput !== undefined) {
      this.toolOutput = toolOutput;
    }
    if (toolExitCode !== undefined) {
      this.toolExitCode = toolExitCode;
    }
  }
}

/**
 * The built artifact did not survive a minimal invocation
 */
export class SmokeTestFailure extends SealcheckError {
  public readonly artifactPath: string;
  public readonly toolOutput?: string;

  constructor(message: string, artifactPath: string, toolOutput?: string) {
    super("smoke-test", ExitCodes.SMOKE_TEST_FAILURE, message);
    this.artifactPath = artifactPath;
    if (toolOutput !== undefined) {
      this.toolOutput = toolOutput;
    }
  }
}

/**
 * Pipeline failure kinds, one per fatal error class
 */
export type FailureKind =
  | "HermeticityViolation"
  | "EnvironmentLoadError"
  | "BuildFailure"
  | "SmokeTestFailure";

/**
 * Maps an error to the pipeline failure kind it represents, if any
 */
export function failureKindOf(error: unknown): FailureKind | null {
  if (error instanceof HermeticityViolation) return "HermeticityViolation";
  if (error instanceof EnvironmentLoadError) return "EnvironmentLoadError";
  if (error instanceof BuildFailure) return "BuildFailure";
  if (error instanceof SmokeTestFailure) return "SmokeTestFailure";
  return null;
}
