// pattern: Testing Infrastructure
// Runs "remote" commands in a local POSIX shell whose HOME is a temp directory

import { copyFile } from "node:fs/promises";

import { createCommand } from "../../utils/command/index.js";

import type { RawCommandOutput, SshTransport } from "../../ssh/types.js";
import type { Logger } from "pino";

/**
 * Lets the real remote command text run against a throwaway home directory,
 * so tests can inspect the files it leaves behind.
 */
export class LocalShellTransport implements SshTransport {
  readonly commands: string[] = [];
  private open = true;

  constructor(
    private readonly homeDir: string,
    private readonly logger: Logger
  ) {}

  get isOpen(): boolean {
    return this.open;
  }

  async exec(command: string, timeoutMs: number): Promise<RawCommandOutput> {
    if (!this.open) {
      throw new Error("SSH connection is closed");
    }
    this.commands.push(command);

    const result = await createCommand("sh", this.logger)
      .addArgs(["-c", command])
      .envs({ HOME: this.homeDir })
      .currentDir(this.homeDir)
      .timeout(timeoutMs)
      .run();

    return {
      exitCode: result.exitCode ?? -1,
      stdout: Buffer.from(result.stdout, "utf8"),
      stderr: Buffer.from(result.stderr, "utf8"),
    };
  }

  async putFile(localPath: string, remotePath: string): Promise<void> {
    await copyFile(localPath, remotePath);
  }

  async getFile(remotePath: string, localPath: string): Promise<void> {
    await copyFile(remotePath, localPath);
  }

  close(): void {
    this.open = false;
  }
}
