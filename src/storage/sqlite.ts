import Database from 'better-sqlite3';
import type {
  ArchiveStorage,
  MessageRow,
  PeerRow,
  ScanMessagesOptions,
} from './adapter.js';
import { peerKeyPrefix } from '../codec/records.js';

/**
 * Peer table: int64 peer id -> tagged stream
 */
export const PEER_TABLE = 't2';

/**
 * Message table: 20-byte message key -> message value
 */
export const MESSAGE_TABLE = 't7';

/**
 * Create empty peer and message tables with the archive's layout
 */
export function createArchiveSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${PEER_TABLE} (
      key    INTEGER PRIMARY KEY,
      value  BLOB
    );

    CREATE TABLE IF NOT EXISTS ${MESSAGE_TABLE} (
      key    BLOB PRIMARY KEY,
      value  BLOB
    );
  `);
}

const EMPTY = new Uint8Array(0);

interface RawMessageRow {
  key: Buffer;
  value: Buffer | null;
}

/**
 * better-sqlite3 reader over a decrypted archive file.
 * Scans return whole arrays: the connection cannot serve peer lookups
 * while a statement iterator is open.
 */
export class SQLiteArchive implements ArchiveStorage {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
  }

  messageKeys(): Uint8Array[] {
    return this.db
      .prepare<[], { key: Buffer }>(`SELECT key FROM ${MESSAGE_TABLE}`)
      .all()
      .map((row) => row.key);
  }

  messages(options: ScanMessagesOptions = {}): MessageRow[] {
    const order = options.order === 'asc' ? 'ASC' : 'DESC';
    // SQLite treats a negative LIMIT as no limit
    const limit = options.limit ?? -1;

    let rows: RawMessageRow[];
    if (options.peerId !== undefined) {
      rows = this.db
        .prepare<[Buffer, number], RawMessageRow>(`
          SELECT key, value
          FROM ${MESSAGE_TABLE}
          WHERE substr(key, 1, 8) = ?
          ORDER BY key ${order}
          LIMIT ?
        `)
        .all(Buffer.from(peerKeyPrefix(options.peerId)), limit);
    } else {
      rows = this.db
        .prepare<[number], RawMessageRow>(`
          SELECT key, value
          FROM ${MESSAGE_TABLE}
          ORDER BY key ${order}
          LIMIT ?
        `)
        .all(limit);
    }

    return rows.map((row) => ({ key: row.key, value: row.value ?? EMPTY }));
  }

  peers(): PeerRow[] {
    return this.db
      .prepare<[], { key: bigint; value: Buffer | null }>(`SELECT key, value FROM ${PEER_TABLE}`)
      .safeIntegers()
      .all()
      .map((row) => ({ peerId: row.key, value: row.value ?? EMPTY }));
  }

  getPeer(peerId: bigint): Uint8Array | null {
    const row = this.db
      .prepare<[bigint], { value: Buffer | null }>(`SELECT value FROM ${PEER_TABLE} WHERE key = ? LIMIT 1`)
      .get(peerId);

    if (!row) {
      return null;
    }
    return row.value ?? EMPTY;
  }

  countMessages(): number {
    return this.count(MESSAGE_TABLE);
  }

  countPeers(): number {
    return this.count(PEER_TABLE);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private count(table: string): number {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
    return row?.n ?? 0;
  }
}
