// pattern: Mixed (unavoidable)
// Sequential command execution and file transfer over one authenticated session

import { stat } from "node:fs/promises";

import { CommandExecutionError, getErrorMessage, TransferError } from "../utils/errors.js";

import {
  type CommandResult,
  DEFAULT_SSH_TIMEOUTS,
  type RawCommandOutput,
  type RemoteShell,
  type SshTimeouts,
  type SshTransport,
} from "./types.js";

import type { Logger } from "pino";

const decoder = new TextDecoder("utf-8", { fatal: false });

/**
 * Decode captured output as UTF-8. Invalid byte sequences become U+FFFD
 * instead of raising.
 */
export function decodeOutput(bytes: Buffer): string {
  return decoder.decode(bytes);
}

function toCommandResult(raw: RawCommandOutput): CommandResult {
  return Object.freeze({
    exitCode: raw.exitCode,
    stdout: decodeOutput(raw.stdout),
    stderr: decodeOutput(raw.stderr),
  });
}

/**
 * Runs commands on an authenticated session, strictly one at a time and in
 * submission order.
 *
 * A batch is fail-fast: when a command cannot complete (connection dropped,
 * timeout, channel refused) the rest of the batch is skipped and a
 * CommandExecutionError carrying the results collected so far is thrown.
 *
 * The channel owns its transport; `close()` releases it exactly once.
 */
export class CommandChannel implements RemoteShell {
  private released = false;

  constructor(
    private readonly transport: SshTransport,
    private readonly logger: Logger,
    private readonly timeouts: SshTimeouts = DEFAULT_SSH_TIMEOUTS
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  async execute(commands: readonly string[]): Promise<CommandResult[]> {
    const results: CommandResult[] = [];
    if (commands.length === 0) {
      return results;
    }

    for (const [index, command] of commands.entries()) {
      if (this.released) {
        throw new CommandExecutionError("Session has already been released", {
          command,
          failedIndex: index,
          completed: [...results],
        });
      }

      this.logger.trace({ command, index }, "Executing remote command");

      let raw: RawCommandOutput;
      try {
        raw = await this.transport.exec(command, this.timeouts.commandMs);
      } catch (error) {
        this.logger.debug(
          { err: error, command, index, completed: results.length },
          "Remote command did not complete"
        );
        throw new CommandExecutionError(
          `Command ${index + 1} of ${commands.length} did not complete: ${getErrorMessage(error)}`,
          { command, failedIndex: index, completed: [...results] },
          { cause: error }
        );
      }

      const result = toCommandResult(raw);
      this.logger.trace(
        { command, exitCode: result.exitCode },
        "Remote command finished"
      );
      results.push(result);
    }

    return results;
  }

  async executeOne(command: string): Promise<CommandResult> {
    const [result] = await this.execute([command]);
    if (!result) {
      throw new CommandExecutionError("No result returned for command", {
        command,
        failedIndex: 0,
        completed: [],
      });
    }
    return result;
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const details = { operation: "upload" as const, localPath, remotePath };

    try {
      const info = await stat(localPath);
      if (!info.isFile()) {
        throw new Error(`${localPath} is not a regular file`);
      }
    } catch (error) {
      throw new TransferError(
        `Local file cannot be uploaded: ${getErrorMessage(error)}`,
        details,
        { cause: error }
      );
    }

    this.assertUsable(details);
    try {
      await this.transport.putFile(localPath, remotePath, this.timeouts.transferMs);
    } catch (error) {
      throw new TransferError(
        `Upload to ${remotePath} failed: ${getErrorMessage(error)}`,
        details,
        { cause: error }
      );
    }
    this.logger.debug({ localPath, remotePath }, "Uploaded file");
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const details = { operation: "download" as const, localPath, remotePath };

    this.assertUsable(details);
    try {
      await this.transport.getFile(remotePath, localPath, this.timeouts.transferMs);
    } catch (error) {
      throw new TransferError(
        `Download of ${remotePath} failed: ${getErrorMessage(error)}`,
        details,
        { cause: error }
      );
    }
    this.logger.debug({ localPath, remotePath }, "Downloaded file");
  }

  close(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.transport.close();
    this.logger.debug("Session released");
  }

  private assertUsable(details: {
    operation: "upload" | "download";
    localPath: string;
    remotePath: string;
  }): void {
    if (this.released) {
      throw new TransferError("Session has already been released", details);
    }
  }
}
