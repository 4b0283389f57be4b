import type { StoreExporter } from './storage/decryptor.js';

/**
 * Configuration for ChatStore
 */
export interface ChatStoreConfig {
  /** Root searched for the store and key file (defaults to $CHAT_ARCHIVE_CONTAINER, then the client's group container) */
  containerPath?: string;
  /** Encrypted store path (located under the container if omitted) */
  databasePath?: string;
  /** Wrapped key file path (located under the container if omitted) */
  keyPath?: string;
  /** Passphrase the key file is wrapped with */
  passphrase?: string;
  /** External decrypt engine (defaults to the sqlcipher shell) */
  exporter?: StoreExporter;
  /** Directory for the plaintext copy (defaults to the OS temp dir) */
  tempDir?: string;
  /** Sender label for outgoing messages */
  selfName?: string;
}

/**
 * A peer matched by name, username or phone
 */
export interface PeerSummary {
  peerId: bigint;
  name: string;
  username: string;
  phone: string;
}

/**
 * A chat with its latest activity
 */
export interface ChatSummary extends PeerSummary {
  /** Unix seconds of the newest message */
  lastMessageTimestamp: number;
}

/**
 * A message read from one chat
 */
export interface MessageRecord {
  /** Unix seconds */
  timestamp: number;
  sender: string;
  text: string;
  peerId: bigint;
  messageId: number;
}

/**
 * A message matched by text search
 */
export interface SearchHit {
  timestamp: number;
  chatName: string;
  sender: string;
  text: string;
  peerId: bigint;
}

/**
 * A message from a bulk export
 */
export interface ArchivedMessage {
  peerId: bigint;
  peerName: string;
  messageId: number;
  timestamp: number;
  text: string;
  isFromMe: boolean;
  /** Null for outgoing messages */
  senderName: string | null;
}

export interface ArchiveStats {
  messages: number;
  peers: number;
}
