// pattern: Imperative Shell
// Authentication fallback: key, then password with key provisioning

import { access } from "node:fs/promises";

import {
  ConfigurationError,
  ConnectionError,
  getErrorMessage,
} from "../utils/errors.js";

import { CommandChannel } from "./command-channel.js";
import {
  ensureKeyPair,
  expandHomePath,
  installAuthorizedKey,
  type KeyPairGenerator,
} from "./credential-bootstrap.js";
import { loadPrivateKey } from "./key-formats.js";
import {
  DEFAULT_KEY_PATH,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_TIMEOUTS,
  type SshConnectOptions,
  type SshConnector,
  type SshTarget,
  type SshTimeouts,
} from "./types.js";

import type { Logger } from "pino";

export type AuthMethod = "key" | "password";

export interface BootstrapResult {
  channel: CommandChannel;
  method: AuthMethod;
  /** What happened on the way, in order, for display to the operator */
  messages: string[];
}

export interface SessionBootstrapOptions {
  connector: SshConnector;
  logger: Logger;
  timeouts?: SshTimeouts;
  generateKeyPair?: KeyPairGenerator;
}

export const KEY_VERIFICATION_TOKEN = "edgeprobe-key-ok";

async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

/**
 * Remediation text shown when no session could be opened
 */
export function connectionRemediation(target: SshTarget): string[] {
  const portFlag = target.port === DEFAULT_SSH_PORT ? "" : `-p ${target.port} `;
  return [
    "What to do:",
    "  1. Verify the host is reachable (ping, VPN status)",
    "  2. Check username and password in the inventory file",
    "  3. Ensure SSH is enabled on the remote host",
    `  4. Try manually: ssh ${portFlag}${target.username}@${target.address}`,
  ];
}

/**
 * Opens a session for exactly one target. Build a new instance per target;
 * nothing here is shared between targets.
 *
 * Attempts, in order, stopping at the first success:
 * 1. key authentication, when a key path is configured and the file exists
 * 2. password authentication, followed by installing a key for next time
 *    (a failure there is only reported in `messages`)
 * 3. otherwise a ConnectionError with remediation text
 */
export class SessionBootstrap {
  private readonly logger: Logger;
  private readonly timeouts: SshTimeouts;

  constructor(
    private readonly target: SshTarget,
    private readonly options: SessionBootstrapOptions
  ) {
    this.logger = options.logger.child({ target: target.address });
    this.timeouts = options.timeouts ?? DEFAULT_SSH_TIMEOUTS;
  }

  async connect(): Promise<BootstrapResult> {
    const messages: string[] = [];

    const keyChannel = await this.tryKeyAuth(messages);
    if (keyChannel) {
      return { channel: keyChannel, method: "key", messages };
    }

    const passwordChannel = await this.tryPasswordAuth(messages);
    if (passwordChannel) {
      await this.provisionKey(passwordChannel, messages);
      return { channel: passwordChannel, method: "password", messages };
    }

    if (messages.length === 0) {
      messages.push(
        `No usable credentials: no key file at ${this.keyPath()} and no password configured`
      );
    }

    const text = [
      `Could not establish SSH connection to ${this.target.username}@${this.target.address}`,
      ...messages.map(message => `  - ${message}`),
      "",
      ...connectionRemediation(this.target),
    ].join("\n");

    this.logger.debug({ attempts: messages }, "All authentication attempts failed");
    throw new ConnectionError(text, this.target.address, messages);
  }

  /**
   * Log in with the password and install the local public key, creating the
   * key pair first when needed. The session is closed afterwards.
   */
  async provisionWithPassword(): Promise<string> {
    if (this.target.password === undefined) {
      throw new ConfigurationError(
        `No password configured for ${this.target.username}@${this.target.address}`
      );
    }

    const publicKeyPath = await ensureKeyPair(this.target.keyPath ?? DEFAULT_KEY_PATH, {
      logger: this.logger,
      ...(this.options.generateKeyPair && { generate: this.options.generateKeyPair }),
    });

    const messages: string[] = [];
    const channel = await this.tryPasswordAuth(messages);
    if (!channel) {
      throw new ConnectionError(
        [
          `Could not log in to ${this.target.username}@${this.target.address} with the configured password`,
          ...messages.map(message => `  - ${message}`),
          "",
          ...connectionRemediation(this.target),
        ].join("\n"),
        this.target.address,
        messages
      );
    }

    try {
      await installAuthorizedKey(channel, publicKeyPath);
    } finally {
      channel.close();
    }
    return publicKeyPath;
  }

  /**
   * Confirm that key authentication works on its own, by opening a
   * key-only session and echoing a token.
   */
  async verifyKeyLogin(): Promise<boolean> {
    const messages: string[] = [];
    const channel = await this.tryKeyAuth(messages);
    if (!channel) {
      this.logger.debug({ messages }, "Key login verification failed");
      return false;
    }

    try {
      const result = await channel.executeOne(`echo ${KEY_VERIFICATION_TOKEN}`);
      return result.exitCode === 0 && result.stdout.trim() === KEY_VERIFICATION_TOKEN;
    } finally {
      channel.close();
    }
  }

  private keyPath(): string {
    return expandHomePath(this.target.keyPath ?? DEFAULT_KEY_PATH);
  }

  private baseConnectOptions(): Omit<SshConnectOptions, "password" | "privateKey" | "passphrase"> {
    return {
      host: this.target.address,
      port: this.target.port,
      username: this.target.username,
      readyTimeoutMs: this.timeouts.connectMs,
    };
  }

  private async tryKeyAuth(messages: string[]): Promise<CommandChannel | undefined> {
    if (this.target.keyPath === undefined) {
      return undefined;
    }

    const keyPath = this.keyPath();
    if (!(await fileExists(keyPath))) {
      this.logger.debug({ keyPath }, "Key file not found, skipping key authentication");
      return undefined;
    }

    // Encrypted keys fall back to the login password as passphrase
    const passphrase = this.target.keyPassphrase ?? this.target.password;

    try {
      const key = await loadPrivateKey(keyPath, passphrase);
      this.logger.debug({ keyPath, format: key.format }, "Attempting key authentication");

      const transport = await this.options.connector({
        ...this.baseConnectOptions(),
        privateKey: key.data,
        ...(passphrase !== undefined && { passphrase }),
      });

      messages.push(`Connected using SSH key: ${this.target.keyPath}`);
      return new CommandChannel(transport, this.logger, this.timeouts);
    } catch (error) {
      messages.push(`Key auth failed: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private async tryPasswordAuth(messages: string[]): Promise<CommandChannel | undefined> {
    if (this.target.password === undefined) {
      return undefined;
    }

    this.logger.debug("Attempting password authentication");
    try {
      const transport = await this.options.connector({
        ...this.baseConnectOptions(),
        password: this.target.password,
      });
      messages.push("Connected using password");
      return new CommandChannel(transport, this.logger, this.timeouts);
    } catch (error) {
      messages.push(`Password auth failed: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private async provisionKey(channel: CommandChannel, messages: string[]): Promise<void> {
    try {
      const publicKeyPath = await ensureKeyPair(this.target.keyPath ?? DEFAULT_KEY_PATH, {
        logger: this.logger,
        ...(this.options.generateKeyPair && { generate: this.options.generateKeyPair }),
      });
      await installAuthorizedKey(channel, publicKeyPath);
      messages.push(`SSH key bootstrapped: ${publicKeyPath}`);
    } catch (error) {
      this.logger.warn({ err: error }, "Key bootstrap failed; continuing with password session");
      messages.push(`Key bootstrap failed: ${getErrorMessage(error)}`);
    }
  }
}
