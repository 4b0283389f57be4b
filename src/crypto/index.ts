export {
  MURMUR_SEED,
  murmurHash3,
  concatBytes,
  bytesToHex,
} from './utils.js';

export {
  DEFAULT_PASSPHRASE,
  STORE_KEY_SIZE,
  STORE_SALT_SIZE,
  WRAPPED_PAYLOAD_SIZE,
  type StoreKey,
  derivePassphraseCipher,
  unwrapStoreKey,
  wrapStoreKey,
  storeKeyToHex,
} from './keys.js';

export {
  BLOCK_SIZE,
  IV_SIZE,
  cbcEncrypt,
  cbcDecrypt,
} from './encryption.js';
