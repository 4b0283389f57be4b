import { cbc } from '@noble/ciphers/aes';

/**
 * AES block size in bytes
 */
export const BLOCK_SIZE = 16;

/**
 * CBC IV size in bytes
 */
export const IV_SIZE = 16;

function checkParams(key: Uint8Array, iv: Uint8Array, data: Uint8Array): void {
  if (key.length !== 32) {
    throw new Error('Invalid key length: expected 32 bytes for AES-256');
  }

  if (iv.length !== IV_SIZE) {
    throw new Error(`Invalid IV length: expected ${IV_SIZE} bytes`);
  }

  if (data.length % BLOCK_SIZE !== 0) {
    throw new Error(`Invalid data length: ${data.length} is not a multiple of ${BLOCK_SIZE}`);
  }
}

/**
 * Encrypt block-aligned data using AES-256-CBC, without padding
 * @param key - 32-byte AES-256 key
 * @param iv - 16-byte initialization vector
 * @param plaintext - Data to encrypt, a multiple of 16 bytes
 */
export function cbcEncrypt(
  key: Uint8Array,
  iv: Uint8Array,
  plaintext: Uint8Array
): Uint8Array {
  checkParams(key, iv, plaintext);
  return cbc(key, iv, { disablePadding: true }).encrypt(plaintext);
}

/**
 * Decrypt data using AES-256-CBC, leaving any padding in place
 * @param key - 32-byte AES-256 key
 * @param iv - 16-byte initialization vector
 * @param ciphertext - Encrypted data, a multiple of 16 bytes
 */
export function cbcDecrypt(
  key: Uint8Array,
  iv: Uint8Array,
  ciphertext: Uint8Array
): Uint8Array {
  checkParams(key, iv, ciphertext);
  return cbc(key, iv, { disablePadding: true }).decrypt(ciphertext);
}
