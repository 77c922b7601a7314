// pattern: Testing Infrastructure
// In-process stand-ins for an SSH connection

import type {
  RawCommandOutput,
  SshConnectOptions,
  SshConnector,
  SshTransport,
} from "../../ssh/types.js";

export type ExecHandler = (
  command: string
) => RawCommandOutput | Promise<RawCommandOutput>;

export interface ScriptedOutput {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

/**
 * Build raw output the way it arrives from a remote host
 */
export function rawOutput(
  exitCode: number,
  stdout: string | Buffer = "",
  stderr: string | Buffer = ""
): RawCommandOutput {
  return {
    exitCode,
    stdout: typeof stdout === "string" ? Buffer.from(stdout, "utf8") : stdout,
    stderr: typeof stderr === "string" ? Buffer.from(stderr, "utf8") : stderr,
  };
}

/**
 * Answer commands from a fixed table; unknown commands exit 127
 */
export function scriptedHandler(
  script: Readonly<Record<string, ScriptedOutput>>
): ExecHandler {
  return command => {
    const entry = script[command];
    if (!entry) {
      return rawOutput(127, "", `sh: ${command}: not found`);
    }
    return rawOutput(entry.exitCode ?? 0, entry.stdout ?? "", entry.stderr ?? "");
  };
}

/**
 * Records every command and transfer; never touches the network.
 * `drop()` simulates the remote end closing the connection.
 */
export class FakeTransport implements SshTransport {
  readonly commands: string[] = [];
  readonly uploads: { localPath: string; remotePath: string }[] = [];
  readonly downloads: { remotePath: string; localPath: string }[] = [];
  closeCount = 0;
  transferError: Error | undefined;

  private open = true;

  constructor(private readonly handler: ExecHandler = () => rawOutput(0)) {}

  get isOpen(): boolean {
    return this.open;
  }

  drop(): void {
    this.open = false;
  }

  async exec(command: string, _timeoutMs: number): Promise<RawCommandOutput> {
    if (!this.open) {
      throw new Error("SSH connection is closed");
    }
    this.commands.push(command);
    return this.handler(command);
  }

  async putFile(localPath: string, remotePath: string): Promise<void> {
    this.assertTransferable();
    this.uploads.push({ localPath, remotePath });
  }

  async getFile(remotePath: string, localPath: string): Promise<void> {
    this.assertTransferable();
    this.downloads.push({ remotePath, localPath });
  }

  close(): void {
    this.closeCount++;
    this.open = false;
  }

  private assertTransferable(): void {
    if (!this.open) {
      throw new Error("SSH connection is closed");
    }
    if (this.transferError) {
      throw this.transferError;
    }
  }
}

export type ConnectAttempt = Omit<SshConnectOptions, "privateKey"> & {
  authentication: "key" | "password";
};

/**
 * A connector whose behaviour per credential is decided by the test.
 * Every attempt is recorded, whether it succeeds or not.
 */
export class FakeConnector {
  readonly attempts: ConnectAttempt[] = [];
  readonly transports: FakeTransport[] = [];

  constructor(
    private readonly accept: (attempt: ConnectAttempt) => boolean,
    private readonly handler: ExecHandler = () => rawOutput(0)
  ) {}

  readonly connect: SshConnector = async options => {
    const { privateKey, ...rest } = options;
    const attempt: ConnectAttempt = {
      ...rest,
      authentication: privateKey === undefined ? "password" : "key",
    };
    this.attempts.push(attempt);

    if (!this.accept(attempt)) {
      throw new Error("All configured authentication methods failed");
    }

    const transport = new FakeTransport(this.handler);
    this.transports.push(transport);
    return transport;
  };
}
