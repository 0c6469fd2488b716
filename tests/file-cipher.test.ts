/**
 * Tests for whole-file lock / unlock.
 */
import { describe, test, expect } from "vitest";
import { readdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { isLockedFile, lockFile, unlockFile } from "../src/cipher/file-cipher.js";
import {
  AlreadyLockedError,
  AuthenticationError,
  FileNotFoundError,
  InvalidArgumentsError,
  NotLockedError,
  PasswordMismatchError,
} from "../src/core/exceptions.js";
import { FAST_KDF, makeTmpDir } from "./fixtures.js";

const ORIGINAL = Buffer.from(Array.from({ length: 300 }, (_, i) => (i * 7) % 256));

function makeFile(): string {
  const path = join(makeTmpDir(), "plain.db");
  writeFileSync(path, ORIGINAL);
  return path;
}

const opts = { kdf: FAST_KDF };

describe("file cipher", () => {
  test("lock then unlock restores the exact bytes", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);

    const locked = readFileSync(path);
    expect(locked.length).toBe(ORIGINAL.length + 57);
    expect(locked.subarray(0, 8).toString("ascii")).toBe("DBEELOCK");
    expect(await isLockedFile(path)).toBe(true);

    await unlockFile(path, "test-secret");
    expect(readFileSync(path).equals(ORIGINAL)).toBe(true);
    expect(await isLockedFile(path)).toBe(false);
  });

  test("each lock uses a fresh salt and nonce", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    const first = readFileSync(path);
    await unlockFile(path, "test-secret");
    await lockFile(path, "test-secret", "test-secret", opts);
    expect(readFileSync(path).equals(first)).toBe(false);
  });

  test("wrong password fails and leaves the file untouched", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    const locked = readFileSync(path);

    await expect(unlockFile(path, "not-the-secret")).rejects.toThrow(AuthenticationError);
    expect(readFileSync(path).equals(locked)).toBe(true);
    expect(readdirSync(join(path, ".."))).toEqual(["plain.db"]);
  });

  test("tampered ciphertext is rejected", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    const bytes = readFileSync(path);
    bytes[bytes.length - 1] ^= 0xff;
    writeFileSync(path, bytes);

    await expect(unlockFile(path, "test-secret")).rejects.toThrow(AuthenticationError);
  });

  test("tampered kdf parameters are rejected", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    const bytes = readFileSync(path);
    bytes[10] = 11;
    writeFileSync(path, bytes);

    await expect(unlockFile(path, "test-secret")).rejects.toThrow(AuthenticationError);
  });

  test("kdf parameters outside the accepted range are refused", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    const bytes = readFileSync(path);
    bytes[10] = 5;
    writeFileSync(path, bytes);

    await expect(unlockFile(path, "test-secret")).rejects.toThrow(
      "Authentication failed: unsupported key derivation parameters",
    );
  });

  test("locking twice fails", async () => {
    const path = makeFile();
    await lockFile(path, "test-secret", "test-secret", opts);
    await expect(lockFile(path, "test-secret", "test-secret", opts)).rejects.toThrow(
      AlreadyLockedError,
    );
  });

  test("unlocking a plain file fails without touching it", async () => {
    const path = makeFile();
    await expect(unlockFile(path, "test-secret")).rejects.toThrow(NotLockedError);
    expect(readFileSync(path).equals(ORIGINAL)).toBe(true);
  });

  test("mismatched confirmation", async () => {
    const path = makeFile();
    await expect(lockFile(path, "test-secret", "test-secreT", opts)).rejects.toThrow(
      PasswordMismatchError,
    );
    expect(readFileSync(path).equals(ORIGINAL)).toBe(true);
  });

  test("empty password", async () => {
    const path = makeFile();
    await expect(lockFile(path, "", "", opts)).rejects.toThrow(InvalidArgumentsError);
  });

  test("missing file", async () => {
    const path = join(makeTmpDir(), "missing.db");
    await expect(lockFile(path, "test-secret", "test-secret", opts)).rejects.toThrow(
      FileNotFoundError,
    );
    await expect(unlockFile(path, "test-secret")).rejects.toThrow(FileNotFoundError);
  });
});
