/**
 * Raw message table row
 */
export interface MessageRow {
  key: Uint8Array;    // 20-byte message key
  value: Uint8Array;  // encoded message value
}

/**
 * Raw peer table row
 */
export interface PeerRow {
  peerId: bigint;
  value: Uint8Array;  // tagged stream
}

/**
 * Options for scanning the message table
 */
export interface ScanMessagesOptions {
  /** Only rows whose key starts with this peer id */
  peerId?: bigint;
  /** Key order ('desc' is newest first within a peer). Defaults to 'desc'. */
  order?: 'asc' | 'desc';
  /** Maximum number of rows to return. Unlimited when omitted. */
  limit?: number;
}

/**
 * Read-only access to a plaintext archive
 */
export interface ArchiveStorage {
  /**
   * Every message key, in storage order
   */
  messageKeys(): Uint8Array[];

  /**
   * Message rows in key order
   */
  messages(options?: ScanMessagesOptions): MessageRow[];

  /**
   * Every peer row, in storage order
   */
  peers(): PeerRow[];

  /**
   * Raw peer value by id
   */
  getPeer(peerId: bigint): Uint8Array | null;

  countMessages(): number;

  countPeers(): number;

  /**
   * Close the storage connection
   */
  close(): void;
}
