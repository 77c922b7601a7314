// pattern: Functional Core
// Types shared by the SSH transport, command channel and bootstrap

/**
 * One remote host to connect to. Immutable for the duration of a run.
 */
export interface SshTarget {
  readonly address: string;
  readonly username: string;
  readonly port: number;
  readonly password?: string;
  readonly keyPath?: string;
  readonly keyPassphrase?: string;
}

/**
 * Outcome of one remote command, decoded as text
 */
export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Undecoded output as captured off the wire
 */
export interface RawCommandOutput {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

export interface SshConnectOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer | string;
  passphrase?: string;
  /** Milliseconds to wait for the handshake and authentication */
  readyTimeoutMs: number;
}

/**
 * Authenticated SSH connection. Implementations must reject pending and
 * future operations once the underlying connection has closed.
 */
export interface SshTransport {
  readonly isOpen: boolean;
  exec(command: string, timeoutMs: number): Promise<RawCommandOutput>;
  putFile(localPath: string, remotePath: string, timeoutMs: number): Promise<void>;
  getFile(remotePath: string, localPath: string, timeoutMs: number): Promise<void>;
  close(): void;
}

/**
 * Opens an authenticated transport, rejecting when authentication fails
 */
export type SshConnector = (options: SshConnectOptions) => Promise<SshTransport>;

/**
 * The command surface probes and the credential bootstrap rely on
 */
export interface RemoteShell {
  execute(commands: readonly string[]): Promise<CommandResult[]>;
  executeOne(command: string): Promise<CommandResult>;
}

export interface SshTimeouts {
  connectMs: number;
  commandMs: number;
  transferMs: number;
}

export const DEFAULT_SSH_TIMEOUTS: SshTimeouts = {
  connectMs: 10_000,
  commandMs: 10_000,
  transferMs: 60_000,
};

export const DEFAULT_SSH_PORT = 22;

export const DEFAULT_KEY_PATH = "~/.ssh/id_rsa";
