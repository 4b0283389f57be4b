import Database from 'better-sqlite3';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createArchiveSchema, PEER_TABLE, MESSAGE_TABLE } from '../src/storage/sqlite.js';
import type { ExportRequest, StoreExporter } from '../src/storage/decryptor.js';
import { encodeMessageKey, encodeMessageValue, encodePeer } from '../src/codec/records.js';
import type { Peer } from '../src/codec/types.js';
import { wrapStoreKey, type StoreKey } from '../src/crypto/keys.js';

export interface FixturePeer {
  peerId: bigint;
  peer: Partial<Peer>;
}

export interface FixtureMessage {
  peerId: bigint;
  timestamp: number;
  messageId: number;
  text: string;
  incoming: boolean;
  authorId?: bigint;
  /** Store these bytes instead of an encoded value */
  raw?: Uint8Array;
}

export const ALICE = 1001n;
export const BOOK_CLUB = 1002n;
export const BOB = 1003n;
export const CAROL = 1004n;

export const PEERS: FixturePeer[] = [
  {
    peerId: ALICE,
    peer: { firstName: 'Alice', lastName: 'Smith', username: 'alice', phone: '+1 (555) 123-4567' },
  },
  { peerId: BOOK_CLUB, peer: { title: 'Book Club' } },
  { peerId: BOB, peer: { username: 'bob_k' } },
  { peerId: CAROL, peer: { firstName: 'Carol', phone: '44 20 7946 0000' } },
];

export const MESSAGES: FixtureMessage[] = [
  { peerId: ALICE, timestamp: 1700000100, messageId: 1, text: 'hi alice', incoming: true },
  { peerId: ALICE, timestamp: 1700000200, messageId: 2, text: 'lunch tomorrow?', incoming: false },
  { peerId: ALICE, timestamp: 1700000300, messageId: 3, text: 'Sure, see you at noon', incoming: true },
  { peerId: BOOK_CLUB, timestamp: 1700000050, messageId: 1, text: 'Chapter 3 discussion', incoming: true, authorId: BOB },
  { peerId: BOOK_CLUB, timestamp: 1700000400, messageId: 2, text: 'Meeting moved to Friday', incoming: true, authorId: CAROL },
  { peerId: CAROL, timestamp: 1700000450, messageId: 2, text: '', incoming: false },
  // Truncated right after the discriminator
  { peerId: CAROL, timestamp: 1700000500, messageId: 3, text: '', incoming: true, raw: new Uint8Array([0]) },
];

export const STORE_KEY: StoreKey = {
  key: new Uint8Array(32).fill(0x5a),
  salt: new Uint8Array(16).fill(0xa5),
};

export function hexToBytes(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(hex, 'hex'));
}

export function makeTempDir(prefix: string = 'archive-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Write a plaintext archive with the peer and message tables
 */
export function writeArchive(
  path: string,
  peers: FixturePeer[] = PEERS,
  messages: FixtureMessage[] = MESSAGES
): void {
  const db = new Database(path);
  createArchiveSchema(db);

  const insertPeer = db.prepare(`INSERT INTO ${PEER_TABLE} (key, value) VALUES (?, ?)`);
  for (const { peerId, peer } of peers) {
    insertPeer.run(peerId, Buffer.from(encodePeer(peer)));
  }

  const insertMessage = db.prepare(`INSERT INTO ${MESSAGE_TABLE} (key, value) VALUES (?, ?)`);
  for (const m of messages) {
    const key = encodeMessageKey({
      peerId: m.peerId,
      namespace: 0,
      timestamp: m.timestamp,
      messageId: m.messageId,
    });
    const value = m.raw ?? encodeMessageValue({ text: m.text, incoming: m.incoming, authorId: m.authorId });
    insertMessage.run(Buffer.from(key), Buffer.from(value));
  }

  db.close();
}

/**
 * In-process stand-in for the sqlcipher shell: records each request and
 * writes the fixture archive to the destination.
 */
export function fakeExporter(
  write: (destinationPath: string) => void = (path) => writeArchive(path)
): StoreExporter & { requests: ExportRequest[] } {
  const requests: ExportRequest[] = [];
  const exporter = (request: ExportRequest) => {
    requests.push(request);
    write(request.destinationPath);
    return { status: 0, stderr: '' };
  };
  return Object.assign(exporter, { requests });
}

/**
 * Lay out an encrypted store and wrapped key file under a fresh directory
 */
export function makeSourceFiles(
  dir: string,
  passphrase?: string
): { databasePath: string; keyPath: string } {
  const databasePath = join(dir, 'db_sqlite');
  const keyPath = join(dir, '.tempkeyEncrypted');
  writeFileSync(databasePath, 'encrypted-store-placeholder');
  writeFileSync(keyPath, wrapStoreKey(STORE_KEY, passphrase));
  return { databasePath, keyPath };
}
