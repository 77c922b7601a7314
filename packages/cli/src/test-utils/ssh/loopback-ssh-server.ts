// pattern: Testing Infrastructure
// Real ssh2 server on 127.0.0.1 for exercising the ssh2 transport in process

import ssh2 from "ssh2";

import type {
  AuthContext,
  Connection,
  ParsedKey,
  Server,
  ServerChannel,
} from "ssh2";

/**
 * Answers one exec request. Returning without ending the channel leaves
 * the command hanging.
 */
export type ExecHandler = (
  command: string,
  channel: ServerChannel,
  connection: Connection
) => void;

export interface LoopbackSshServerOptions {
  username: string;
  password: string;
  exec: ExecHandler;
}

function parsePublicKey(line: string): ParsedKey | undefined {
  const parsed = ssh2.utils.parseKey(line);
  return parsed instanceof Error ? undefined : parsed;
}

/**
 * Accepts the configured password and any key in `authorizedKeys`. Keys
 * installed through the authorized_keys command are added there.
 */
export class LoopbackSshServer {
  readonly authorizedKeys: string[] = [];
  /** Commands whose exec channel the client has closed */
  readonly closedChannels: string[] = [];
  private readonly connections = new Set<Connection>();

  private readonly server: Server;
  private listeningPort = 0;

  constructor(private readonly options: LoopbackSshServerOptions) {
    const hostKey = ssh2.utils.generateKeyPairSync("ed25519");
    this.server = new ssh2.Server({ hostKeys: [hostKey.private] }, connection => {
      this.connections.add(connection);
      connection.on("close", () => {
        this.connections.delete(connection);
      });
      connection.on("error", () => {
        this.connections.delete(connection);
      });
      connection.on("authentication", context => {
        this.authenticate(context);
      });
      connection.on("ready", () => {
        connection.on("session", acceptSession => {
          const session = acceptSession();
          session.on("exec", (acceptExec, _rejectExec, info) => {
            const channel = acceptExec();
            // drain client input so the channel can reach "close"
            channel.resume();
            channel.on("close", () => {
              this.closedChannels.push(info.command);
            });
            this.handleExec(info.command, channel, connection);
          });
        });
      });
    });
  }

  get port(): number {
    return this.listeningPort;
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        this.server.removeListener("error", reject);
        resolve();
      });
    });

    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Loopback SSH server has no TCP address");
    }
    this.listeningPort = address.port;
  }

  async stop(): Promise<void> {
    for (const connection of this.connections) {
      connection.end();
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }

  private authenticate(context: AuthContext): void {
    if (context.username !== this.options.username) {
      context.reject();
      return;
    }

    if (context.method === "password") {
      if (context.password === this.options.password) {
        context.accept();
      } else {
        context.reject();
      }
      return;
    }

    if (context.method === "publickey") {
      const offered = context.key;
      const match = this.authorizedKeys
        .map(parsePublicKey)
        .find(
          key =>
            key !== undefined &&
            key.type === offered.algo &&
            key.getPublicSSH().equals(offered.data)
        );

      if (!match) {
        context.reject();
        return;
      }
      if (context.signature === undefined || context.blob === undefined) {
        // key query before the signed attempt
        context.accept();
        return;
      }
      if (match.verify(context.blob, context.signature, context.hashAlgo) === true) {
        context.accept();
      } else {
        context.reject();
      }
      return;
    }

    context.reject(["password", "publickey"]);
  }

  private handleExec(command: string, channel: ServerChannel, connection: Connection): void {
    if (command.startsWith("umask 077 && mkdir -p ~/.ssh")) {
      const key = /grep -qxF '([^']+)'/.exec(command)?.[1];
      if (key !== undefined && !this.authorizedKeys.includes(key)) {
        this.authorizedKeys.push(key);
      }
      channel.exit(key === undefined ? 1 : 0);
      channel.end();
      return;
    }

    this.options.exec(command, channel, connection);
  }
}
