// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects for performance
import { execa, ExecaError, type Options } from "execa";

import { createSandbox } from "../sandbox/index.js";

import type { FinalizedSandboxConfig } from "../sandbox/index.js";
import type { Logger } from "pino";

/**
 * Outcome of a command run with {@link CommandBuilder.run}
 */
export interface CommandResult {
  /** Exit status, undefined when the process was killed or never started */
  exitCode: number | undefined;
  /** Signal that terminated the process, if any */
  signal: string | undefined;
  timedOut: boolean;
  /** True for any non-zero exit, signal, timeout or spawn failure */
  failed: boolean;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in the order they were written */
  all: string;
  /** Short description of the failure, empty on success */
  failureMessage: string;
}

/**
 * A command builder that provides a Rust Command-like API with logging integration.
 * Handles environment overlays, timeouts, stderr logging, and sandboxing.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private cwd?: string;
  private timeoutMs?: number;
  private sandboxConfig?: FinalizedSandboxConfig;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: readonly string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables; they win over the inherited environment
   */
  envs(envVars: Readonly<Record<string, string>>): this {
    Object.assign(this.env, envVars);
    return this;
  }

  /**
   * Set working directory
   */
  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  /**
   * Kill the process if it runs longer than this
   */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  /**
   * Enable sandboxing with the specified configuration.
   * The config should have paths already resolved by the caller.
   */
  withSandbox(config: FinalizedSandboxConfig): this {
    this.sandboxConfig = config;
    return this;
  }

  private async prepareInvocation(): Promise<{
    command: string;
    args: string[];
    options: Options;
  }> {
    let actualCommand = this.command;
    let actualArgs = [...this.args];

    if (this.sandboxConfig) {
      const sandbox = createSandbox(this.childLogger, this.sandboxConfig);

      const isValid = await sandbox.validate();
      if (!isValid && this.sandboxConfig.enabled) {
        throw new Error(
          `Sandbox ${sandbox.name} is not usable on this host; install bubblewrap or run without --sandbox`
        );
      }

      const sandboxArgs = sandbox.buildSandboxArgs(
        this.command,
        this.args,
        this.cwd
      );
      if (sandboxArgs) {
        actualCommand = sandboxArgs.executable;
        actualArgs = sandboxArgs.args;

        this.childLogger.debug(
          {
            sandbox: sandbox.name,
            originalCommand: this.command,
            sandboxCommand: actualCommand,
          },
          "Applying sandbox to command"
        );
      }
    }

    this.childLogger.debug(
      {
        command: actualCommand,
        argCount: actualArgs.length,
        cwd: this.cwd,
        timeoutMs: this.timeoutMs,
        sandboxed: this.sandboxConfig?.enabled ?? false,
      },
      "Executing command"
    );

    const options: Options = {
      env: { ...process.env, ...this.env },
      stdin: "ignore",
      stderr: "pipe",
      stdout: "pipe",
      ...(this.cwd !== undefined && { cwd: this.cwd }),
      ...(this.timeoutMs !== undefined && { timeout: this.timeoutMs }),
    };

    return { command: actualCommand, args: actualArgs, options };
  }

  /**
   * Execute the command to completion without throwing on failure.
   * Spawn errors, signals, timeouts and non-zero exits are all reported
   * in the result; only sandbox setup problems are thrown.
   */
  async run(): Promise<CommandResult> {
    const { command, args, options } = await this.prepareInvocation();

    const result = await execa(command, args, {
      ...options,
      all: true,
      reject: false,
    });

    if (typeof result.stderr === "string" && result.stderr.trim()) {
      this.childLogger.debug({ stderr: result.stderr }, "Command stderr output");
    }

    const commandResult: CommandResult = {
      exitCode: result.exitCode,
      signal: result.signal,
      timedOut: result.timedOut,
      failed: result.failed,
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      all: typeof result.all === "string" ? result.all : "",
      failureMessage: result instanceof ExecaError ? result.shortMessage : "",
    };

    this.childLogger.debug(
      {
        exitCode: commandResult.exitCode,
        signal: commandResult.signal,
        timedOut: commandResult.timedOut,
        duration: result.durationMs,
      },
      commandResult.failed ? "Command failed" : "Command completed successfully"
    );

    return commandResult;
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
