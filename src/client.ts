import { existsSync, readFileSync } from 'node:fs';
import { DEFAULT_PASSPHRASE, unwrapStoreKey } from './crypto/keys.js';
import {
  parseMessageKey,
  parseMessageValue,
  parsePeer,
  peerDisplayName,
  EMPTY_PEER,
  type MessageKey,
  type MessageValue,
  type Peer,
} from './codec/index.js';
import {
  SQLiteArchive,
  decryptStore,
  resolveContainerPath,
  findDatabasePath,
  findKeyPath,
  type ArchiveStorage,
  type PlaintextStore,
  type StoreExporter,
} from './storage/index.js';
import { ArchiveUnavailableError } from './errors.js';
import type {
  ChatStoreConfig,
  ChatSummary,
  PeerSummary,
  MessageRecord,
  SearchHit,
  ArchivedMessage,
  ArchiveStats,
} from './types.js';

/**
 * Identifiers made only of digits and above this value are taken as peer ids
 */
const MIN_LITERAL_PEER_ID = 100000n;

function digitsOf(text: string): string {
  return text.replace(/\D/g, '');
}

/**
 * Read-only view of a local encrypted chat archive.
 *
 * The store is decrypted lazily on the first query and the plaintext copy
 * is reused until {@link close}. Peers are cached for the lifetime of the
 * open store.
 */
export class ChatStore {
  private readonly databasePath: string | null;
  private readonly keyPath: string | null;
  private readonly passphrase: string;
  private readonly exporter: StoreExporter | undefined;
  private readonly tempDir: string | undefined;
  private readonly selfName: string;
  private storage: ArchiveStorage | null = null;
  private plaintext: PlaintextStore | null = null;
  private peerCache: Map<bigint, Peer> = new Map();
  private readonly exitHook = (): void => this.release();

  constructor(config: ChatStoreConfig = {}) {
    const containerPath = resolveContainerPath(config.containerPath);
    this.databasePath = config.databasePath ?? findDatabasePath(containerPath);
    this.keyPath = config.keyPath ?? findKeyPath(containerPath);
    this.passphrase = config.passphrase ?? DEFAULT_PASSPHRASE;
    this.exporter = config.exporter;
    this.tempDir = config.tempDir;
    this.selfName = config.selfName ?? 'Me';
  }

  /**
   * Whether both the encrypted store and the key file exist
   */
  get available(): boolean {
    return (
      this.databasePath !== null &&
      this.keyPath !== null &&
      existsSync(this.databasePath) &&
      existsSync(this.keyPath)
    );
  }

  /**
   * Unwrap the key and export the plaintext store. Runs at most once until closed.
   * @throws ArchiveUnavailableError if the store or key file is missing
   * @throws IntegrityError if the key fails its integrity check
   * @throws DecryptionError if the export fails
   */
  open(): void {
    this.connection();
  }

  /**
   * Close the store and delete the plaintext copy. Idempotent.
   */
  close(): void {
    process.off('exit', this.exitHook);
    this.release();
  }

  /**
   * Latest chats, newest activity first
   */
  recentChats(limit: number = 20): ChatSummary[] {
    const storage = this.connection();

    const latest = new Map<bigint, number>();
    for (const key of storage.messageKeys()) {
      const parsed = parseMessageKey(key);
      if (!parsed.ok) continue;
      const { peerId, timestamp } = parsed.value;
      const seen = latest.get(peerId);
      if (seen === undefined || timestamp > seen) {
        latest.set(peerId, timestamp);
      }
    }

    return [...latest.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([peerId, lastMessageTimestamp]) => ({
        ...this.summarize(peerId, this.getPeer(peerId)),
        lastMessageTimestamp,
      }));
  }

  /**
   * Peers whose name, username or phone contains the query (case-insensitive),
   * or whose phone digits contain the query's digits. Storage order.
   */
  findChats(query: string): PeerSummary[] {
    const storage = this.connection();
    const needle = query.toLowerCase();
    const needleDigits = digitsOf(query);

    const results: PeerSummary[] = [];
    for (const row of storage.peers()) {
      const peer = parsePeer(row.value);
      this.peerCache.set(row.peerId, peer);

      const summary = this.summarize(row.peerId, peer);
      const searchable = `${summary.name} ${peer.username} ${peer.phone}`.toLowerCase();
      const phoneMatch = needleDigits !== '' && digitsOf(peer.phone).includes(needleDigits);

      if (searchable.includes(needle) || phoneMatch) {
        results.push(summary);
      }
    }
    return results;
  }

  /**
   * First peer whose phone digits contain the digits of `phone`
   */
  findPeerByPhone(phone: string): bigint | null {
    const digits = digitsOf(phone);
    if (!digits) {
      return null;
    }

    const storage = this.connection();
    for (const row of storage.peers()) {
      const peer = parsePeer(row.value);
      this.peerCache.set(row.peerId, peer);
      const peerDigits = digitsOf(peer.phone);
      if (peerDigits && peerDigits.includes(digits)) {
        return row.peerId;
      }
    }
    return null;
  }

  /**
   * Resolve a peer id, phone number or name to a peer id.
   * Large all-digit identifiers are returned as-is without touching the store.
   */
  resolveIdentifier(identifier: string): bigint | null {
    const stripped = identifier.trim();

    if (/^\d+$/.test(stripped) && BigInt(stripped) > MIN_LITERAL_PEER_ID) {
      return BigInt(stripped);
    }

    if (/\d/.test(stripped)) {
      const byPhone = this.findPeerByPhone(stripped);
      if (byPhone !== null) {
        return byPhone;
      }
    }

    const matches = this.findChats(stripped);
    return matches.length > 0 ? matches[0].peerId : null;
  }

  /**
   * The latest `limit` messages of one chat, newest first. Messages without
   * text are dropped after the limit is applied, so fewer may be returned.
   */
  readMessages(peerId: bigint, limit: number = 20): MessageRecord[] {
    const storage = this.connection();

    const messages: MessageRecord[] = [];
    for (const row of storage.messages({ peerId, order: 'desc', limit })) {
      const decoded = this.decodeRow(row.key, row.value);
      if (!decoded || !decoded.message.text) continue;

      const { key, message } = decoded;
      messages.push({
        timestamp: key.timestamp,
        sender: this.senderName(key, message) ?? this.selfName,
        text: message.text,
        peerId: key.peerId,
        messageId: key.messageId,
      });
    }
    return messages;
  }

  /**
   * Case-insensitive text search across all chats, newest key first
   */
  searchMessages(query: string, limit: number = 50): SearchHit[] {
    const storage = this.connection();
    const needle = query.toLowerCase();

    const results: SearchHit[] = [];
    for (const row of storage.messages({ order: 'desc' })) {
      if (results.length >= limit) break;

      const decoded = this.decodeRow(row.key, row.value);
      if (!decoded || !decoded.message.text) continue;
      if (!decoded.message.text.toLowerCase().includes(needle)) continue;

      const { key, message } = decoded;
      results.push({
        timestamp: key.timestamp,
        chatName: peerDisplayName(this.getPeer(key.peerId)),
        sender: this.senderName(key, message) ?? this.selfName,
        text: message.text,
        peerId: key.peerId,
      });
    }
    return results;
  }

  /**
   * Every message at or after `sinceTimestamp` (unix seconds), in key order
   */
  allMessages(sinceTimestamp: number = 0): ArchivedMessage[] {
    const storage = this.connection();

    const messages: ArchivedMessage[] = [];
    for (const row of storage.messages({ order: 'asc' })) {
      const keyResult = parseMessageKey(row.key);
      if (!keyResult.ok || keyResult.value.timestamp < sinceTimestamp) continue;

      const valueResult = parseMessageValue(row.value);
      if (!valueResult.ok) continue;

      const key = keyResult.value;
      const message = valueResult.value;
      messages.push({
        peerId: key.peerId,
        peerName: peerDisplayName(this.getPeer(key.peerId)),
        messageId: key.messageId,
        timestamp: key.timestamp,
        text: message.text,
        isFromMe: !message.incoming,
        senderName: this.senderName(key, message),
      });
    }
    return messages;
  }

  stats(): ArchiveStats {
    const storage = this.connection();
    return {
      messages: storage.countMessages(),
      peers: storage.countPeers(),
    };
  }

  /**
   * Peer by id, cached. Unknown ids resolve to an empty peer.
   */
  getPeer(peerId: bigint): Peer {
    const cached = this.peerCache.get(peerId);
    if (cached) {
      return cached;
    }

    const value = this.connection().getPeer(peerId);
    const peer = value === null ? { ...EMPTY_PEER } : parsePeer(value);
    this.peerCache.set(peerId, peer);
    return peer;
  }

  private connection(): ArchiveStorage {
    if (this.storage) {
      return this.storage;
    }

    if (this.databasePath === null || this.keyPath === null || !this.available) {
      throw new ArchiveUnavailableError(
        'Chat archive not found. Is the desktop client installed and logged in?'
      );
    }

    const storeKey = unwrapStoreKey(readFileSync(this.keyPath), this.passphrase);
    const plaintext = decryptStore(this.databasePath, storeKey, {
      exporter: this.exporter,
      tempDir: this.tempDir,
    });

    try {
      this.storage = new SQLiteArchive(plaintext.path);
    } catch (error) {
      plaintext.dispose();
      throw error;
    }

    this.plaintext = plaintext;
    process.once('exit', this.exitHook);
    return this.storage;
  }

  private release(): void {
    if (this.storage) {
      this.storage.close();
      this.storage = null;
    }
    if (this.plaintext) {
      try {
        this.plaintext.dispose();
      } catch (error) {
        console.error('Failed to delete decrypted archive copy:', error);
      }
      this.plaintext = null;
    }
    this.peerCache.clear();
  }

  private decodeRow(
    rawKey: Uint8Array,
    rawValue: Uint8Array
  ): { key: MessageKey; message: MessageValue } | null {
    const key = parseMessageKey(rawKey);
    if (!key.ok) return null;
    const message = parseMessageValue(rawValue);
    if (!message.ok) return null;
    return { key: key.value, message: message.value };
  }

  /**
   * Display name of the author of an incoming message; null for outgoing ones
   */
  private senderName(key: MessageKey, message: MessageValue): string | null {
    if (!message.incoming) {
      return null;
    }
    const authorId = message.authorId !== null && message.authorId !== 0n
      ? message.authorId
      : key.peerId;
    return peerDisplayName(this.getPeer(authorId));
  }

  private summarize(peerId: bigint, peer: Peer): PeerSummary {
    return {
      peerId,
      name: peerDisplayName(peer),
      username: peer.username,
      phone: peer.phone,
    };
  }
}
