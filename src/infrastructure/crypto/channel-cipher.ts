import { createDecipheriv } from 'node:crypto';
import { DecryptionError } from '../../domain/index.js';

/**
 * AES-CTR channel cipher used by Meshtastic.
 *
 * The initial counter block is derived from the packet itself, so
 * decryption is stateless and can be replayed for any packet:
 *
 *   bytes 0..7   packet id, 64-bit little-endian
 *   bytes 8..15  sender node id, 64-bit little-endian
 *
 * CTR mode never fails on content. A wrong key yields garbage that the
 * payload decoder classifies as malformed.
 */

/** Meshtastic's published default channel key (PSK index 1, "AQ=="). */
export const DEFAULT_CHANNEL_KEY: Readonly<Uint8Array> = Uint8Array.from([
  0xd4, 0xf1, 0xbb, 0x3a, 0x20, 0x29, 0x07, 0x59,
  0xf0, 0xbc, 0xff, 0xab, 0xcf, 0x4e, 0x69, 0x01,
]);

const NONCE_LENGTH = 16;
const UINT32_MAX = 0xffffffff;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface NonceSeed {
  packetId: number;
  fromNodeId: number;
}

type CtrAlgorithm = 'aes-128-ctr' | 'aes-256-ctr';

function algorithmFor(key: Uint8Array): CtrAlgorithm {
  if (key.length === 16) return 'aes-128-ctr';
  if (key.length === 32) return 'aes-256-ctr';
  throw new DecryptionError(`Invalid key length: ${key.length} bytes (expected 16 or 32)`);
}

function assertUint32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new DecryptionError(`${field} must be an unsigned 32-bit integer`);
  }
}

/**
 * Decodes a channel key as written in Meshtastic configs.
 *
 * Accepts base64 and base64url, with or without padding. A single-byte key
 * is a PSK index: 1 selects the default key, 2..255 the default key with
 * its last byte bumped by (index - 1). Index 0 means "no encryption" and
 * is rejected, as is any length other than 1, 16 or 32 bytes.
 */
export function decodeChannelKey(encoded: string): Uint8Array {
  const trimmed = encoded.trim().replace(/-/g, '+').replace(/_/g, '/');
  const padded = trimmed.padEnd(trimmed.length + ((4 - (trimmed.length % 4)) % 4), '=');

  if (trimmed.length === 0 || !BASE64_PATTERN.test(padded)) {
    throw new DecryptionError('Channel key is not valid base64');
  }

  const bytes = Uint8Array.from(Buffer.from(padded, 'base64'));

  if (bytes.length === 1) {
    const index = bytes[0] ?? 0;
    if (index === 0) {
      throw new DecryptionError('PSK index 0 disables encryption and cannot be used');
    }
    const expanded = Uint8Array.from(DEFAULT_CHANNEL_KEY);
    expanded[15] = ((expanded[15] ?? 0) + index - 1) & 0xff;
    return expanded;
  }

  algorithmFor(bytes);
  return bytes;
}

export function buildNonce(seed: NonceSeed): Buffer {
  assertUint32(seed.packetId, 'packetId');
  assertUint32(seed.fromNodeId, 'fromNodeId');

  const nonce = Buffer.alloc(NONCE_LENGTH);
  nonce.writeBigUInt64LE(BigInt(seed.packetId), 0);
  nonce.writeBigUInt64LE(BigInt(seed.fromNodeId), 8);
  return nonce;
}

/**
 * Decrypts a packet payload. Throws DecryptionError only for an unusable
 * key or nonce seed, never because of the ciphertext.
 */
export function decryptPayload(key: Uint8Array, seed: NonceSeed, ciphertext: Uint8Array): Uint8Array {
  const algorithm = algorithmFor(key);
  const decipher = createDecipheriv(algorithm, key, buildNonce(seed));
  return Uint8Array.from(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
}

/** CTR is symmetric: encrypting is the same keystream XOR. */
export const encryptPayload = decryptPayload;
