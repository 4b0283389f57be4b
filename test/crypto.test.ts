import { describe, it, expect } from 'vitest';
import { randomBytes } from '@noble/ciphers/webcrypto';
import {
  murmurHash3,
  MURMUR_SEED,
  bytesToHex,
  concatBytes,
  derivePassphraseCipher,
  unwrapStoreKey,
  wrapStoreKey,
  storeKeyToHex,
  cbcEncrypt,
  cbcDecrypt,
  DEFAULT_PASSPHRASE,
  type StoreKey,
} from '../src/crypto/index.js';
import { IntegrityError } from '../src/errors.js';

const ascii = (s: string) => new TextEncoder().encode(s);

describe('Crypto Utils', () => {
  describe('bytesToHex', () => {
    it('should encode each byte as two lowercase digits', () => {
      expect(bytesToHex(new Uint8Array([0xde, 0xad, 0x00, 0x0f]))).toBe('dead000f');
      expect(bytesToHex(new Uint8Array(0))).toBe('');
    });
  });

  describe('concatBytes', () => {
    it('should join arrays in order', () => {
      const joined = concatBytes(new Uint8Array([1, 2]), new Uint8Array([]), new Uint8Array([3]));
      expect(Array.from(joined)).toEqual([1, 2, 3]);
    });
  });

  describe('murmurHash3', () => {
    it('should match reference vectors', () => {
      expect(murmurHash3(new Uint8Array(0), 0)).toBe(0);
      expect(murmurHash3(new Uint8Array(0), 1)).toBe(0x514e28b7);
      expect(murmurHash3(new Uint8Array(0), 0xffffffff)).toBe(0x81f16f39 | 0);
      expect(murmurHash3(new Uint8Array(4), 0)).toBe(0x2362f9de);
    });

    it('should handle every tail length', () => {
      const seed = 0x9747b28c;
      expect(murmurHash3(ascii('aaaa'), seed)).toBe(0x5a97808a);
      expect(murmurHash3(ascii('Hello, world!'), seed)).toBe(0x24884cba);
      expect(murmurHash3(ascii('The quick brown fox jumps over the lazy dog'), seed)).toBe(0x2fa826cd);
    });

    it('should use the archive seed by default', () => {
      expect(MURMUR_SEED).toBe(-137723950);
      expect(murmurHash3(new Uint8Array(0))).toBe(377927480);
      expect(murmurHash3(ascii('hello'))).toBe(-165922247);
      expect(murmurHash3(ascii('hello'), MURMUR_SEED)).toBe(-165922247);
    });

    it('should return a signed 32-bit integer', () => {
      const hash = murmurHash3(randomBytes(48));
      expect(Number.isInteger(hash)).toBe(true);
      expect(hash).toBeGreaterThanOrEqual(-0x80000000);
      expect(hash).toBeLessThanOrEqual(0x7fffffff);
    });
  });
});

describe('AES-256-CBC', () => {
  const key = new Uint8Array(32).fill(7);
  const iv = new Uint8Array(16).fill(9);

  it('should encrypt and decrypt block-aligned data', () => {
    const plaintext = randomBytes(64);
    const ciphertext = cbcEncrypt(key, iv, plaintext);
    expect(ciphertext.length).toBe(64);
    expect(bytesToHex(cbcDecrypt(key, iv, ciphertext))).toBe(bytesToHex(plaintext));
  });

  it('should reject unaligned data', () => {
    expect(() => cbcDecrypt(key, iv, new Uint8Array(20))).toThrow('not a multiple of 16');
  });

  it('should throw on invalid key length', () => {
    expect(() => cbcEncrypt(new Uint8Array(16), iv, new Uint8Array(16))).toThrow(
      'Invalid key length'
    );
  });
});

describe('Store key derivation', () => {
  const storeKey: StoreKey = {
    key: new Uint8Array(32).fill(0x11),
    salt: new Uint8Array(16).fill(0x22),
  };

  it('should take the key from the head of SHA-512 and the iv from its tail', () => {
    const { key, iv } = derivePassphraseCipher(DEFAULT_PASSPHRASE);
    expect(bytesToHex(key)).toBe('14d6b6ed1d5461facaf94678cd276edac41599bec5867a51117020a6c61ebbbe');
    expect(bytesToHex(iv)).toBe('3f2d23e4b17b70986d7354d0f3a11e92');
  });

  it('should store the integrity hash of key and salt under the archive seed', () => {
    const { key, iv } = derivePassphraseCipher(DEFAULT_PASSPHRASE);
    const plain = cbcDecrypt(key, iv, wrapStoreKey(storeKey));
    const stored = new DataView(plain.buffer, plain.byteOffset + 48, 4).getInt32(0, true);
    expect(stored).toBe(146004570);
  });

  it('should unwrap what was wrapped', () => {
    const wrapped = wrapStoreKey(storeKey);
    expect(wrapped.length).toBe(64);

    const unwrapped = unwrapStoreKey(wrapped);
    expect(bytesToHex(unwrapped.key)).toBe('11'.repeat(32));
    expect(bytesToHex(unwrapped.salt)).toBe('22'.repeat(16));
  });

  it('should fail the integrity check under a different passphrase', () => {
    const wrapped = wrapStoreKey(storeKey, 'local-passcode');
    expect(() => unwrapStoreKey(wrapped)).toThrow(IntegrityError);
    expect(() => unwrapStoreKey(wrapped)).toThrow('Is a local passcode set');
  });

  it('should fail the integrity check when any single bit is flipped', () => {
    const wrapped = wrapStoreKey(storeKey);
    for (let bit = 0; bit < wrapped.length * 8; bit++) {
      const tampered = wrapped.slice();
      tampered[bit >> 3] ^= 1 << (bit & 7);
      expect(() => unwrapStoreKey(tampered)).toThrow(IntegrityError);
    }
  });

  it('should reject a key file of the wrong length', () => {
    expect(() => unwrapStoreKey(new Uint8Array(48))).toThrow(IntegrityError);
    expect(() => unwrapStoreKey(new Uint8Array(70))).toThrow('unexpected length 70');
  });

  it('should hex-encode key and salt together', () => {
    const hex = storeKeyToHex(storeKey);
    expect(hex).toBe('11'.repeat(32) + '22'.repeat(16));
  });
});
