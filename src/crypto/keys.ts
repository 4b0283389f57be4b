import { sha512 } from '@noble/hashes/sha512';
import { cbcDecrypt, cbcEncrypt, BLOCK_SIZE } from './encryption.js';
import { bytesToHex, concatBytes, murmurHash3 } from './utils.js';
import { IntegrityError } from '../errors.js';

/**
 * Passphrase the desktop client uses when no local passcode is set
 */
export const DEFAULT_PASSPHRASE = 'no-matter-key';

export const STORE_KEY_SIZE = 32;
export const STORE_SALT_SIZE = 16;

/**
 * Unwrapped key layout: key(32) + salt(16) + hash(4, little-endian int32)
 */
export const WRAPPED_PAYLOAD_SIZE = STORE_KEY_SIZE + STORE_SALT_SIZE + 4;

/**
 * Key material for the encrypted store
 */
export interface StoreKey {
  key: Uint8Array;   // 32 bytes
  salt: Uint8Array;  // 16 bytes
}

/**
 * AES key and IV derived from the passphrase.
 * The key is the first 32 bytes of SHA-512(passphrase), the IV the last 16.
 */
export function derivePassphraseCipher(passphrase: string): { key: Uint8Array; iv: Uint8Array } {
  const digest = sha512(new TextEncoder().encode(passphrase));
  return { key: digest.slice(0, 32), iv: digest.slice(digest.length - 16) };
}

/**
 * Unwrap the store key from the contents of the wrapped key file.
 * @throws IntegrityError if the file is malformed or the hash does not match,
 *   which usually means the source device has a local passcode set
 */
export function unwrapStoreKey(
  wrapped: Uint8Array,
  passphrase: string = DEFAULT_PASSPHRASE
): StoreKey {
  if (wrapped.length < WRAPPED_PAYLOAD_SIZE || wrapped.length % BLOCK_SIZE !== 0) {
    throw new IntegrityError(
      `Wrapped key has unexpected length ${wrapped.length}; expected a multiple of ${BLOCK_SIZE} of at least ${WRAPPED_PAYLOAD_SIZE} bytes`
    );
  }

  const cipher = derivePassphraseCipher(passphrase);
  const plain = cbcDecrypt(cipher.key, cipher.iv, wrapped);

  const key = plain.slice(0, STORE_KEY_SIZE);
  const salt = plain.slice(STORE_KEY_SIZE, STORE_KEY_SIZE + STORE_SALT_SIZE);
  const storedHash = new DataView(plain.buffer, plain.byteOffset, plain.byteLength)
    .getInt32(STORE_KEY_SIZE + STORE_SALT_SIZE, true);

  const computedHash = murmurHash3(concatBytes(key, salt));
  if (storedHash !== computedHash) {
    throw new IntegrityError(
      `Key integrity check failed (hash mismatch: ${storedHash} != ${computedHash}). ` +
      'Is a local passcode set in the desktop client? Passcode-protected keys are not supported; ' +
      'remove the passcode and try again.'
    );
  }

  return { key, salt };
}

/**
 * Produce a wrapped key file body for the given key material.
 * Inverse of {@link unwrapStoreKey}; the payload is zero-padded to the block size.
 */
export function wrapStoreKey(
  storeKey: StoreKey,
  passphrase: string = DEFAULT_PASSPHRASE
): Uint8Array {
  if (storeKey.key.length !== STORE_KEY_SIZE || storeKey.salt.length !== STORE_SALT_SIZE) {
    throw new Error(`Invalid store key: expected ${STORE_KEY_SIZE}-byte key and ${STORE_SALT_SIZE}-byte salt`);
  }

  const paddedSize = Math.ceil(WRAPPED_PAYLOAD_SIZE / BLOCK_SIZE) * BLOCK_SIZE;
  const plain = new Uint8Array(paddedSize);
  plain.set(storeKey.key, 0);
  plain.set(storeKey.salt, STORE_KEY_SIZE);
  new DataView(plain.buffer).setInt32(
    STORE_KEY_SIZE + STORE_SALT_SIZE,
    murmurHash3(concatBytes(storeKey.key, storeKey.salt)),
    true
  );

  const cipher = derivePassphraseCipher(passphrase);
  return cbcEncrypt(cipher.key, cipher.iv, plain);
}

/**
 * Hex form of key ∥ salt, as the store's cipher engine expects it
 */
export function storeKeyToHex(storeKey: StoreKey): string {
  return bytesToHex(concatBytes(storeKey.key, storeKey.salt));
}
