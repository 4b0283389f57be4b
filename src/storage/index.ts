export type {
  MessageRow,
  PeerRow,
  ScanMessagesOptions,
  ArchiveStorage,
} from './adapter.js';

export {
  SQLiteArchive,
  PEER_TABLE,
  MESSAGE_TABLE,
  createArchiveSchema,
} from './sqlite.js';

export {
  PLAINTEXT_HEADER_SIZE,
  buildExportScript,
  sqlcipherExporter,
  allocatePlaintextDirectory,
  PLAINTEXT_FILE_NAME,
  decryptStore,
  type ExportRequest,
  type ExportResult,
  type StoreExporter,
  type PlaintextStore,
  type DecryptStoreOptions,
} from './decryptor.js';

export {
  DEFAULT_CONTAINER_PATH,
  KEY_FILE_NAME,
  resolveContainerPath,
  findDatabasePath,
  findKeyPath,
} from './locate.js';
