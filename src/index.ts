// Main facade
export { ChatStore } from './client.js';

// Types
export type {
  ChatStoreConfig,
  PeerSummary,
  ChatSummary,
  MessageRecord,
  SearchHit,
  ArchivedMessage,
  ArchiveStats,
} from './types.js';

// Errors
export {
  ArchiveError,
  ArchiveUnavailableError,
  IntegrityError,
  DecryptionError,
  TruncatedDataError,
  UnknownValueTypeError,
  type ParseResult,
} from './errors.js';

// Key derivation
export {
  DEFAULT_PASSPHRASE,
  unwrapStoreKey,
  wrapStoreKey,
  storeKeyToHex,
  murmurHash3,
  bytesToHex,
  type StoreKey,
} from './crypto/index.js';

// Codec
export {
  ValueType,
  TaggedStreamEncoder,
  decodeAll,
  seekField,
  getString,
  getInt32,
  getInt64,
  getObject,
  parseMessageKey,
  encodeMessageKey,
  parseMessageValue,
  encodeMessageValue,
  parsePeer,
  encodePeer,
  peerDisplayName,
  type TaggedValue,
  type TaggedObject,
  type MessageKey,
  type MessageValue,
  type ForwardInfo,
  type Peer,
} from './codec/index.js';

// Storage
export {
  SQLiteArchive,
  decryptStore,
  sqlcipherExporter,
  buildExportScript,
  findDatabasePath,
  findKeyPath,
  type ArchiveStorage,
  type StoreExporter,
  type ExportRequest,
  type ExportResult,
} from './storage/index.js';
