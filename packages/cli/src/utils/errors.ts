// pattern: Functional Core

import type { CommandResult } from "../ssh/types.js";

/**
 * Base class for edgeprobe application errors
 */
export abstract class EdgeProbeError extends Error {
  public readonly category: string;

  protected constructor(
    category: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to the inventory file and command-line configuration
 */
export class ConfigurationError extends EdgeProbeError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends EdgeProbeError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * No SSH session could be obtained for a target. Terminal for that target.
 */
export class ConnectionError extends EdgeProbeError {
  public readonly host?: string;
  public readonly attempts: readonly string[];

  constructor(
    message: string,
    host?: string,
    attempts: readonly string[] = []
  ) {
    super("connection", message);
    this.attempts = attempts;
    if (host) {
      this.host = host;
    }
  }
}

/**
 * A private key could not be parsed as any supported format
 */
export class KeyFormatError extends EdgeProbeError {
  public readonly keyPath?: string;

  constructor(message: string, keyPath?: string) {
    super("credentials", message);
    if (keyPath) {
      this.keyPath = keyPath;
    }
  }
}

/**
 * The local key pair could not be created or written
 */
export class KeyGenerationError extends EdgeProbeError {
  public readonly keyPath: string;

  constructor(message: string, keyPath: string, options?: { cause?: unknown }) {
    super("credentials", message, options);
    this.keyPath = keyPath;
  }
}

/**
 * The public key could not be added to the remote authorized_keys file
 */
export class KeyInstallError extends EdgeProbeError {
  public readonly publicKeyPath: string;

  constructor(
    message: string,
    publicKeyPath: string,
    options?: { cause?: unknown }
  ) {
    super("credentials", message, options);
    this.publicKeyPath = publicKeyPath;
  }
}

/**
 * The transport failed part-way through a command batch. Results collected
 * before the failing command are preserved in `completed`.
 */
export class CommandExecutionError extends EdgeProbeError {
  public readonly command: string;
  public readonly failedIndex: number;
  public readonly completed: readonly CommandResult[];

  constructor(
    message: string,
    details: {
      command: string;
      failedIndex: number;
      completed: readonly CommandResult[];
    },
    options?: { cause?: unknown }
  ) {
    super("execution", message, options);
    this.command = details.command;
    this.failedIndex = details.failedIndex;
    this.completed = details.completed;
  }
}

/**
 * Errors raised by SFTP uploads and downloads
 */
export class TransferError extends EdgeProbeError {
  public readonly operation: "upload" | "download";
  public readonly localPath: string;
  public readonly remotePath: string;

  constructor(
    message: string,
    details: {
      operation: "upload" | "download";
      localPath: string;
      remotePath: string;
    },
    options?: { cause?: unknown }
  ) {
    super("transfer", message, options);
    this.operation = details.operation;
    this.localPath = details.localPath;
    this.remotePath = details.remotePath;
  }
}

/**
 * Extracts a string message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
