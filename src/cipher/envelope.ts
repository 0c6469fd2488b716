/**
 * Locked-file envelope codec.
 *
 * Layout (single-byte integers):
 *
 *   0   8   magic "DBEELOCK"
 *   8   1   format version
 *   9   1   KDF id (1 = scrypt)
 *   10  1   scrypt cost (log2 N)
 *   11  1   scrypt block size (r)
 *   12  1   scrypt parallelization (p)
 *   13  16  salt
 *   29  12  nonce
 *   41  16  AES-256-GCM auth tag
 *   57  ... ciphertext
 *
 * Bytes [0, 41) are the additional authenticated data.
 */
import { AuthenticationError } from "../core/exceptions.js";

export const ENVELOPE_MAGIC = Buffer.from("DBEELOCK", "ascii");
export const ENVELOPE_VERSION = 1;
export const KDF_SCRYPT = 1;

export const SALT_SIZE = 16;
export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;

const VERSION_OFFSET = ENVELOPE_MAGIC.length;
const KDF_OFFSET = VERSION_OFFSET + 1;
const PARAMS_OFFSET = KDF_OFFSET + 1;
const SALT_OFFSET = PARAMS_OFFSET + 3;
const NONCE_OFFSET = SALT_OFFSET + SALT_SIZE;
const TAG_OFFSET = NONCE_OFFSET + NONCE_SIZE;

export const AAD_SIZE = TAG_OFFSET;
export const HEADER_SIZE = TAG_OFFSET + TAG_SIZE;

export interface ScryptParams {
  /** log2 of N. */
  cost: number;
  blockSize: number;
  parallelization: number;
}

export interface Envelope {
  kdf: ScryptParams;
  salt: Buffer;
  nonce: Buffer;
  tag: Buffer;
  ciphertext: Buffer;
}

export function hasEnvelopeMagic(bytes: Uint8Array): boolean {
  if (bytes.length < ENVELOPE_MAGIC.length) return false;
  return ENVELOPE_MAGIC.equals(bytes.subarray(0, ENVELOPE_MAGIC.length));
}

/** Header bytes up to (not including) the tag; authenticated alongside the ciphertext. */
export function encodeAad(kdf: ScryptParams, salt: Buffer, nonce: Buffer): Buffer {
  if (salt.length !== SALT_SIZE || nonce.length !== NONCE_SIZE) {
    throw new RangeError("salt or nonce has the wrong size");
  }
  const aad = Buffer.alloc(AAD_SIZE);
  ENVELOPE_MAGIC.copy(aad, 0);
  aad.writeUInt8(ENVELOPE_VERSION, VERSION_OFFSET);
  aad.writeUInt8(KDF_SCRYPT, KDF_OFFSET);
  aad.writeUInt8(kdf.cost, PARAMS_OFFSET);
  aad.writeUInt8(kdf.blockSize, PARAMS_OFFSET + 1);
  aad.writeUInt8(kdf.parallelization, PARAMS_OFFSET + 2);
  salt.copy(aad, SALT_OFFSET);
  nonce.copy(aad, NONCE_OFFSET);
  return aad;
}

export function encodeEnvelope(envelope: Envelope): Buffer {
  if (envelope.tag.length !== TAG_SIZE) {
    throw new RangeError("auth tag has the wrong size");
  }
  return Buffer.concat([
    encodeAad(envelope.kdf, envelope.salt, envelope.nonce),
    envelope.tag,
    envelope.ciphertext,
  ]);
}

/**
 * Split an envelope into its parts. A truncated or unrecognised header is
 * treated as corruption and reported as an authentication failure.
 */
export function decodeEnvelope(bytes: Buffer): Envelope {
  if (!hasEnvelopeMagic(bytes) || bytes.length < HEADER_SIZE) {
    throw new AuthenticationError("file is truncated or not a locked database");
  }

  const version = bytes.readUInt8(VERSION_OFFSET);
  if (version !== ENVELOPE_VERSION) {
    throw new AuthenticationError(`unsupported envelope version ${version}`);
  }
  const kdfId = bytes.readUInt8(KDF_OFFSET);
  if (kdfId !== KDF_SCRYPT) {
    throw new AuthenticationError(`unsupported key derivation id ${kdfId}`);
  }

  return {
    kdf: {
      cost: bytes.readUInt8(PARAMS_OFFSET),
      blockSize: bytes.readUInt8(PARAMS_OFFSET + 1),
      parallelization: bytes.readUInt8(PARAMS_OFFSET + 2),
    },
    salt: bytes.subarray(SALT_OFFSET, NONCE_OFFSET),
    nonce: bytes.subarray(NONCE_OFFSET, TAG_OFFSET),
    tag: bytes.subarray(TAG_OFFSET, HEADER_SIZE),
    ciphertext: bytes.subarray(HEADER_SIZE),
  };
}
