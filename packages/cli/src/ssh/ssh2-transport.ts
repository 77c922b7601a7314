// pattern: Imperative Shell
// ssh2-backed transport: connection, exec channels and SFTP

import ssh2 from "ssh2";

import type {
  RawCommandOutput,
  SshConnectOptions,
  SshConnector,
  SshTransport,
} from "./types.js";
import type { Logger } from "pino";
import type { Client, ConnectConfig, SFTPWrapper } from "ssh2";

type DropListener = (error: Error) => void;

/**
 * Registers the release of a channel once it exists. Runs when the
 * operation times out or the connection drops before it settles.
 */
type OnAbandon = (release: () => void) => void;

/**
 * Wraps a ready ssh2 Client. Every pending operation is rejected as soon as
 * the connection drops, so callers never wait past a closed socket.
 */
export class Ssh2Transport implements SshTransport {
  private open = true;
  private readonly dropListeners = new Set<DropListener>();

  constructor(
    private readonly client: Client,
    private readonly logger: Logger
  ) {
    client.on("error", error => {
      this.logger.debug({ err: error }, "SSH transport error");
      this.markClosed(error);
    });
    client.on("close", () => {
      this.markClosed(new Error("SSH connection closed"));
    });
  }

  get isOpen(): boolean {
    return this.open;
  }

  exec(command: string, timeoutMs: number): Promise<RawCommandOutput> {
    return this.track(timeoutMs, `Command timed out after ${timeoutMs}ms`, (resolve, reject, onAbandon) => {
      this.client.exec(command, (error, stream) => {
        if (error) {
          reject(error);
          return;
        }
        onAbandon(() => {
          this.logger.debug({ command }, "Closing abandoned exec channel");
          stream.close();
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode = -1;

        stream.on("data", (chunk: Buffer) => {
          stdout.push(chunk);
        });
        stream.stderr.on("data", (chunk: Buffer) => {
          stderr.push(chunk);
        });
        stream.on("exit", (code: unknown) => {
          if (typeof code === "number") {
            exitCode = code;
          }
        });
        stream.on("close", () => {
          resolve({
            exitCode,
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr),
          });
        });
      });
    });
  }

  putFile(localPath: string, remotePath: string, timeoutMs: number): Promise<void> {
    return this.withSftp(timeoutMs, (sftp, resolve, reject) => {
      sftp.fastPut(localPath, remotePath, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  getFile(remotePath: string, localPath: string, timeoutMs: number): Promise<void> {
    return this.withSftp(timeoutMs, (sftp, resolve, reject) => {
      sftp.fastGet(remotePath, localPath, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (!this.open) {
      return;
    }
    this.markClosed(new Error("SSH connection closed by client"));
    this.client.end();
  }

  private markClosed(reason: Error): void {
    this.open = false;
    for (const listener of [...this.dropListeners]) {
      listener(reason);
    }
    this.dropListeners.clear();
  }

  private withSftp(
    timeoutMs: number,
    operation: (
      sftp: SFTPWrapper,
      resolve: () => void,
      reject: (error: Error) => void
    ) => void
  ): Promise<void> {
    return this.track<void>(timeoutMs, `File transfer timed out after ${timeoutMs}ms`, (resolve, reject, onAbandon) => {
      this.client.sftp((error, sftp) => {
        if (error) {
          reject(error);
          return;
        }
        onAbandon(() => {
          this.logger.debug("Closing abandoned SFTP session");
          sftp.end();
        });
        operation(
          sftp,
          () => {
            sftp.end();
            resolve();
          },
          transferError => {
            sftp.end();
            reject(transferError);
          }
        );
      });
    });
  }

  private releaseChannel(release: () => void): void {
    try {
      release();
    } catch (error) {
      // the connection may already have taken the channel with it
      this.logger.debug({ err: error }, "Could not release channel");
    }
  }

  /**
   * Runs an operation bounded by a timeout and by the connection's lifetime
   */
  private track<T>(
    timeoutMs: number,
    timeoutMessage: string,
    operation: (
      resolve: (value: T) => void,
      reject: (error: Error) => void,
      onAbandon: OnAbandon
    ) => void
  ): Promise<T> {
    if (!this.open) {
      return Promise.reject(new Error("SSH connection is closed"));
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let abandoned = false;
      let release: (() => void) | undefined;

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.dropListeners.delete(onDrop);
        finish();
      };

      const abandon = (error: Error): void => {
        if (settled) return;
        abandoned = true;
        settle(() => reject(error));
        if (release) {
          this.releaseChannel(release);
        }
      };

      // a channel that opens after the deadline is released straight away
      const onAbandon: OnAbandon = releaseChannel => {
        if (abandoned) {
          this.releaseChannel(releaseChannel);
        } else {
          release = releaseChannel;
        }
      };

      const onDrop: DropListener = error => {
        abandon(error);
      };
      this.dropListeners.add(onDrop);

      const timer = setTimeout(() => {
        abandon(new Error(timeoutMessage));
      }, timeoutMs);

      try {
        operation(
          value => settle(() => resolve(value)),
          error => settle(() => reject(error)),
          onAbandon
        );
      } catch (error) {
        settle(() =>
          reject(error instanceof Error ? error : new Error(String(error)))
        );
      }
    });
  }
}

/**
 * Connector that opens a real SSH connection with exactly the credential
 * supplied in the options.
 */
export function createSsh2Connector(logger: Logger): SshConnector {
  return options => connectSsh2(options, logger);
}

export function connectSsh2(
  options: SshConnectOptions,
  logger: Logger
): Promise<SshTransport> {
  const connectLogger = logger.child({ component: "ssh2" });

  return new Promise((resolve, reject) => {
    const client = new ssh2.Client();

    const config: ConnectConfig = {
      host: options.host,
      port: options.port,
      username: options.username,
      readyTimeout: options.readyTimeoutMs,
      ...(options.password !== undefined && { password: options.password }),
      ...(options.privateKey !== undefined && {
        privateKey: options.privateKey,
      }),
      ...(options.passphrase !== undefined && {
        passphrase: options.passphrase,
      }),
    };

    const onError = (error: Error): void => {
      connectLogger.debug(
        { err: error, host: options.host, port: options.port },
        "SSH connection attempt failed"
      );
      client.end();
      reject(error);
    };

    client.once("ready", () => {
      client.removeListener("error", onError);
      connectLogger.debug(
        { host: options.host, port: options.port },
        "SSH connection ready"
      );
      resolve(new Ssh2Transport(client, logger));
    });
    client.once("error", onError);

    client.connect(config);
  });
}
