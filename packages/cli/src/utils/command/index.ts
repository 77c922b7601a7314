// pattern: Imperative Shell
// Local process execution with logging integration
import { execa } from "execa";

import type { Logger } from "pino";

export const DEFAULT_LOCAL_TIMEOUT_MS = 10_000;

/**
 * Outcome of a local process. Non-zero exits are reported, not thrown.
 */
export interface LocalCommandResult {
  /** undefined when the process could not be spawned or was killed */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The executable could not be started at all (usually not installed) */
  spawnFailed: boolean;
}

/**
 * A command builder for local processes. Every run is bounded by a timeout;
 * stderr is logged at DEBUG level.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private cwd?: string;
  private timeoutMs = DEFAULT_LOCAL_TIMEOUT_MS;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add command arguments
   */
  arg(arg: string): this {
    this.args.push(arg);
    return this;
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: readonly string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables (merged with parent)
   */
  envs(envVars: Record<string, string>): this {
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

  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  /**
   * Execute the command and capture its output
   */
  async run(): Promise<LocalCommandResult> {
    this.childLogger.debug(
      {
        command: this.command,
        argCount: this.args.length,
        cwd: this.cwd,
        timeoutMs: this.timeoutMs,
      },
      "Executing command"
    );

    const result = await execa(this.command, this.args, {
      env: this.env,
      stderr: "pipe",
      stdout: "pipe",
      reject: false,
      timeout: this.timeoutMs,
      ...(this.cwd !== undefined && { cwd: this.cwd }),
    });

    if (result.stderr.trim()) {
      this.childLogger.debug({ stderr: result.stderr }, "Command stderr output");
    }

    const spawnFailed =
      result.failed && result.exitCode === undefined && !result.isTerminated;

    this.childLogger.debug(
      {
        exitCode: result.exitCode,
        duration: result.durationMs,
        timedOut: result.timedOut,
        spawnFailed,
      },
      "Command finished"
    );

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
      spawnFailed,
    };
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
