// pattern: Imperative Shell
// Local key pair provisioning and idempotent remote key installation

import {
  access,
  chmod,
  mkdir,
  readFile,
  rename,
  rm,
  writeFile,
} from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

import { quote } from "shlex";
import ssh2 from "ssh2";

import {
  getErrorMessage,
  KeyGenerationError,
  KeyInstallError,
} from "../utils/errors.js";

import type { RemoteShell } from "./types.js";
import type { Logger } from "pino";

export const RSA_KEY_BITS = 4096;
export const KEY_COMMENT = "generated-by-edgeprobe";

export interface GeneratedKeyPair {
  /** OpenSSH private key text */
  privateKey: string;
  /** Single authorized_keys line */
  publicKey: string;
}

export type KeyPairGenerator = () => GeneratedKeyPair;

export interface EnsureKeyPairOptions {
  generate?: KeyPairGenerator;
  logger?: Logger;
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHomePath(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  return path;
}

export function generateRsaKeyPair(): GeneratedKeyPair {
  const pair = ssh2.utils.generateKeyPairSync("rsa", {
    bits: RSA_KEY_BITS,
    comment: KEY_COMMENT,
  });
  return { privateKey: pair.private, publicKey: pair.public };
}

async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

// In-flight provisioning per resolved private key path
const pendingKeyPairs = new Map<string, Promise<string>>();

/**
 * Make sure a key pair exists at `keyPath` and return the public key path.
 *
 * When both `keyPath` and `keyPath.pub` already exist nothing is written.
 * Concurrent calls for the same path share one provisioning run.
 */
export function ensureKeyPair(
  keyPath: string,
  options: EnsureKeyPairOptions = {}
): Promise<string> {
  const privateKeyPath = expandHomePath(keyPath);

  const pending = pendingKeyPairs.get(privateKeyPath);
  if (pending) {
    return pending;
  }

  const provisioning = provisionKeyPair(privateKeyPath, options).finally(() => {
    pendingKeyPairs.delete(privateKeyPath);
  });
  pendingKeyPairs.set(privateKeyPath, provisioning);
  return provisioning;
}

async function provisionKeyPair(
  privateKeyPath: string,
  options: EnsureKeyPairOptions
): Promise<string> {
  const publicKeyPath = `${privateKeyPath}.pub`;

  if ((await fileExists(privateKeyPath)) && (await fileExists(publicKeyPath))) {
    options.logger?.debug({ publicKeyPath }, "Existing key pair found");
    return publicKeyPath;
  }

  const generate = options.generate ?? generateRsaKeyPair;

  try {
    await mkdir(dirname(privateKeyPath), { recursive: true, mode: 0o700 });

    const pair = generate();

    await writeFileAtomically(privateKeyPath, pair.privateKey, 0o600);
    await writeFileAtomically(publicKeyPath, `${pair.publicKey.trim()}\n`, 0o644);
  } catch (error) {
    throw new KeyGenerationError(
      `Could not create SSH key pair at ${privateKeyPath}: ${getErrorMessage(error)}`,
      privateKeyPath,
      { cause: error }
    );
  }

  options.logger?.info({ publicKeyPath }, "Generated new SSH key pair");
  return publicKeyPath;
}

// Readers see either the old file or the complete new one
async function writeFileAtomically(
  path: string,
  content: string,
  mode: number
): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, content, { mode });
    // the umask may have narrowed the mode
    await chmod(tempPath, mode);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * One remote command that prepares ~/.ssh and appends the key only when an
 * identical line is not already present.
 */
export function buildAuthorizedKeyCommand(publicKey: string): string {
  const key = quote(publicKey);
  const file = "~/.ssh/authorized_keys";

  return [
    "umask 077",
    "mkdir -p ~/.ssh",
    "chmod 700 ~/.ssh",
    `touch ${file}`,
    `chmod 600 ${file}`,
    // keep the appended key on its own line
    `{ [ ! -s ${file} ] || [ -z "$(tail -c 1 ${file})" ] || echo >> ${file}; }`,
    `{ grep -qxF ${key} ${file} || printf '%s\\n' ${key} >> ${file}; }`,
  ].join(" && ");
}

/**
 * Install the public key at `publicKeyPath` into the remote authorized_keys.
 * Safe to repeat: the key ends up there exactly once.
 */
export async function installAuthorizedKey(
  shell: RemoteShell,
  publicKeyPath: string
): Promise<void> {
  const resolvedPath = expandHomePath(publicKeyPath);

  let publicKey: string;
  try {
    publicKey = (await readFile(resolvedPath, "utf8")).trim();
  } catch (error) {
    throw new KeyInstallError(
      `Could not read public key ${resolvedPath}: ${getErrorMessage(error)}`,
      resolvedPath,
      { cause: error }
    );
  }

  if (!publicKey || publicKey.includes("\n")) {
    throw new KeyInstallError(
      `Public key ${resolvedPath} must contain exactly one key line`,
      resolvedPath
    );
  }

  let exitCode: number;
  let stderr: string;
  try {
    ({ exitCode, stderr } = await shell.executeOne(
      buildAuthorizedKeyCommand(publicKey)
    ));
  } catch (error) {
    throw new KeyInstallError(
      `Could not run key installation on remote host: ${getErrorMessage(error)}`,
      resolvedPath,
      { cause: error }
    );
  }

  if (exitCode !== 0) {
    throw new KeyInstallError(
      `Key installation exited with code ${exitCode}: ${stderr.trim() || "no error output"}`,
      resolvedPath
    );
  }
}
