// pattern: Testing Infrastructure

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import ssh2 from "ssh2";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { KeyFormatError } from "../utils/errors.js";

import {
  KEY_FORMAT_PROBE_ORDER,
  loadPrivateKey,
  probeKeyFormat,
} from "./key-formats.js";

describe("KEY_FORMAT_PROBE_ORDER", () => {
  it("tries RSA, then Ed25519, then ECDSA", () => {
    expect(KEY_FORMAT_PROBE_ORDER.map(probe => probe.format)).toEqual([
      "rsa",
      "ed25519",
      "ecdsa",
    ]);
  });
});

describe("probeKeyFormat", () => {
  it("recognises an RSA key", () => {
    const pair = ssh2.utils.generateKeyPairSync("rsa", { bits: 2048 });

    expect(probeKeyFormat(pair.private)).toBe("rsa");
  });

  it("recognises an Ed25519 key", () => {
    const pair = ssh2.utils.generateKeyPairSync("ed25519");

    expect(probeKeyFormat(pair.private)).toBe("ed25519");
  });

  it("recognises an ECDSA key", () => {
    const pair = ssh2.utils.generateKeyPairSync("ecdsa", { bits: 256 });

    expect(probeKeyFormat(pair.private)).toBe("ecdsa");
  });

  it("opens a passphrase-protected key with the right passphrase", () => {
    const pair = ssh2.utils.generateKeyPairSync("ed25519", {
      passphrase: "test-secret",
      cipher: "aes256-cbc",
      rounds: 16,
    });

    expect(probeKeyFormat(pair.private, "test-secret")).toBe("ed25519");
  });

  it("rejects a protected key without its passphrase", () => {
    const pair = ssh2.utils.generateKeyPairSync("ed25519", {
      passphrase: "test-secret",
      cipher: "aes256-cbc",
      rounds: 16,
    });

    expect(() => probeKeyFormat(pair.private, undefined, "/keys/id")).toThrow(
      KeyFormatError
    );
  });

  it("rejects material that is not a key", () => {
    expect(() => probeKeyFormat("not a key at all")).toThrow(
      /^Private key could not be parsed: /
    );
  });
});

describe("loadPrivateKey", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "edgeprobe-keyformat-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reads the key and reports its format", async () => {
    const pair = ssh2.utils.generateKeyPairSync("ed25519");
    const keyPath = join(tempDir, "id_ed25519");
    await writeFile(keyPath, pair.private);

    const loaded = await loadPrivateKey(keyPath);

    expect(loaded.format).toBe("ed25519");
    expect(loaded.data.toString("utf8")).toBe(pair.private);
  });

  it("raises KeyFormatError for a missing file", async () => {
    const keyPath = join(tempDir, "absent");

    const error = await loadPrivateKey(keyPath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(KeyFormatError);
    if (!(error instanceof KeyFormatError)) return;
    expect(error.keyPath).toBe(keyPath);
  });
});
