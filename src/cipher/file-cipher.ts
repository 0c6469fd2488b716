/**
 * Whole-file password locking: scrypt key derivation + AES-256-GCM.
 *
 * Files are replaced through a temporary sibling and a rename, so a failed
 * lock or unlock leaves the original bytes where they were.
 */
import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  scrypt,
} from "node:crypto";
import { existsSync } from "node:fs";
import { open, readFile, rename, rm, writeFile } from "node:fs/promises";
import { KdfConfigSchema, type KdfConfig } from "../config.js";
import {
  AlreadyLockedError,
  AuthenticationError,
  FileNotFoundError,
  InvalidArgumentsError,
  NotLockedError,
  PasswordMismatchError,
} from "../core/exceptions.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  ENVELOPE_MAGIC,
  NONCE_SIZE,
  SALT_SIZE,
  TAG_SIZE,
  decodeEnvelope,
  encodeAad,
  encodeEnvelope,
  hasEnvelopeMagic,
  type ScryptParams,
} from "./envelope.js";

const CIPHER = "aes-256-gcm";
const KEY_SIZE = 32;

// ---------------------------------------------------------------------------
// Key derivation
// ---------------------------------------------------------------------------

export function deriveKey(
  password: string,
  salt: Buffer,
  params: ScryptParams,
): Promise<Buffer> {
  const N = 2 ** params.cost;
  const r = params.blockSize;
  const p = params.parallelization;
  return new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      KEY_SIZE,
      // scrypt needs 128 * N * r bytes; leave headroom above that.
      { N, r, p, maxmem: 256 * N * r },
      (err, key) => (err ? reject(err) : resolve(key)),
    );
  });
}

/** Parameters read back from an envelope must lie in the range lock_db accepts. */
function supportedParams(params: ScryptParams): boolean {
  return KdfConfigSchema.safeParse(params).success;
}

// ---------------------------------------------------------------------------
// File helpers
// ---------------------------------------------------------------------------

/** True when the file at `path` starts with the envelope magic. */
export async function isLockedFile(path: string): Promise<boolean> {
  const handle = await open(path, "r");
  try {
    const head = Buffer.alloc(ENVELOPE_MAGIC.length);
    const { bytesRead } = await handle.read(head, 0, head.length, 0);
    return hasEnvelopeMagic(head.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

async function replaceFile(path: string, data: Buffer): Promise<void> {
  const tmp = `${path}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await writeFile(tmp, data, { flag: "wx" });
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Lock / unlock
// ---------------------------------------------------------------------------

export interface CipherOptions {
  kdf: KdfConfig;
  logger?: Logger;
}

export async function lockFile(
  path: string,
  password: string,
  confirm: string,
  opts: CipherOptions,
): Promise<void> {
  const logger = opts.logger ?? silentLogger();

  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }
  if (password !== confirm) {
    throw new PasswordMismatchError();
  }
  if (password === "") {
    throw new InvalidArgumentsError("Password must not be empty");
  }

  const plaintext = await readFile(path);
  if (hasEnvelopeMagic(plaintext)) {
    throw new AlreadyLockedError(path);
  }

  const salt = randomBytes(SALT_SIZE);
  const nonce = randomBytes(NONCE_SIZE);
  logger.debug({ path, bytes: plaintext.length, kdf: opts.kdf }, "deriving key");
  const key = await deriveKey(password, salt, opts.kdf);

  const cipher = createCipheriv(CIPHER, key, nonce, { authTagLength: TAG_SIZE });
  cipher.setAAD(encodeAad(opts.kdf, salt, nonce));
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  await replaceFile(
    path,
    encodeEnvelope({
      kdf: opts.kdf,
      salt,
      nonce,
      tag: cipher.getAuthTag(),
      ciphertext,
    }),
  );
  logger.debug({ path }, "file locked");
}

export async function unlockFile(
  path: string,
  password: string,
  opts: { logger?: Logger } = {},
): Promise<void> {
  const logger = opts.logger ?? silentLogger();

  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }

  const bytes = await readFile(path);
  if (!hasEnvelopeMagic(bytes)) {
    throw new NotLockedError(path);
  }

  const envelope = decodeEnvelope(bytes);
  if (!supportedParams(envelope.kdf)) {
    throw new AuthenticationError("unsupported key derivation parameters");
  }

  logger.debug({ path, kdf: envelope.kdf }, "deriving key");
  const key = await deriveKey(password, envelope.salt, envelope.kdf);

  const decipher = createDecipheriv(CIPHER, key, envelope.nonce, {
    authTagLength: TAG_SIZE,
  });
  decipher.setAAD(encodeAad(envelope.kdf, envelope.salt, envelope.nonce));
  decipher.setAuthTag(envelope.tag);

  let plaintext: Buffer;
  try {
    plaintext = Buffer.concat([
      decipher.update(envelope.ciphertext),
      decipher.final(),
    ]);
  } catch (err) {
    logger.debug({ path, err: String(err) }, "tag verification failed");
    throw new AuthenticationError();
  }

  await replaceFile(path, plaintext);
  logger.debug({ path, bytes: plaintext.length }, "file unlocked");
}
