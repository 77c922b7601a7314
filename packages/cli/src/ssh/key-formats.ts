// pattern: Mixed (unavoidable)
// Private key loading with an ordered format probe

import { readFile } from "node:fs/promises";

import ssh2 from "ssh2";

import { getErrorMessage, KeyFormatError } from "../utils/errors.js";

export type KeyFormat = "rsa" | "ed25519" | "ecdsa";

interface KeyFormatProbe {
  format: KeyFormat;
  matches: (keyType: string) => boolean;
}

/**
 * Formats are tried in this order and the first match wins. The order is
 * kept for compatibility with existing key setups; it says nothing about
 * which algorithm is preferable.
 */
export const KEY_FORMAT_PROBE_ORDER: readonly KeyFormatProbe[] = [
  { format: "rsa", matches: keyType => keyType === "ssh-rsa" },
  { format: "ed25519", matches: keyType => keyType === "ssh-ed25519" },
  { format: "ecdsa", matches: keyType => keyType.startsWith("ecdsa-sha2-") },
];

export interface LoadedPrivateKey {
  format: KeyFormat;
  data: Buffer;
}

/**
 * Parse key material and report which supported format it is
 */
export function probeKeyFormat(
  keyData: Buffer | string,
  passphrase?: string,
  keyPath?: string
): KeyFormat {
  const parsed = ssh2.utils.parseKey(keyData, passphrase);
  if (parsed instanceof Error) {
    throw new KeyFormatError(
      `Private key could not be parsed: ${parsed.message}`,
      keyPath
    );
  }

  for (const probe of KEY_FORMAT_PROBE_ORDER) {
    if (probe.matches(parsed.type)) {
      return probe.format;
    }
  }

  throw new KeyFormatError(
    `Unsupported private key type "${parsed.type}" (expected RSA, Ed25519 or ECDSA)`,
    keyPath
  );
}

/**
 * Read a private key from disk and probe its format
 */
export async function loadPrivateKey(
  keyPath: string,
  passphrase?: string
): Promise<LoadedPrivateKey> {
  let data: Buffer;
  try {
    data = await readFile(keyPath);
  } catch (error) {
    throw new KeyFormatError(
      `Private key could not be read: ${getErrorMessage(error)}`,
      keyPath
    );
  }

  return { format: probeKeyFormat(data, passphrase, keyPath), data };
}
