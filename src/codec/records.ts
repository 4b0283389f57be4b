import { ByteReader } from './reader.js';
import { ByteWriter, TaggedStreamEncoder } from './writer.js';
import { decodeAll, seekField } from './tagged.js';
import {
  ValueType,
  MESSAGE_KEY_SIZE,
  REGULAR_MESSAGE,
  MessageFlags,
  MessageDataFlags,
  ForwardInfoFlags,
  type MessageKey,
  type MessageValue,
  type ForwardInfo,
  type Peer,
} from './types.js';
import { TruncatedDataError, parsed, unparsable, type ParseResult } from '../errors.js';

/**
 * Key of the root object inside a peer record
 */
export const PEER_ROOT_KEY = '_';

/**
 * Parse a 20-byte message table key
 */
export function parseMessageKey(key: Uint8Array): ParseResult<MessageKey> {
  if (key.length !== MESSAGE_KEY_SIZE) {
    return unparsable(`Invalid message key length: ${key.length} != ${MESSAGE_KEY_SIZE}`);
  }
  const reader = new ByteReader(key, 0, false);
  return parsed({
    peerId: reader.readInt64(),
    namespace: reader.readInt32(),
    timestamp: reader.readInt32(),
    messageId: reader.readInt32(),
  });
}

export function encodeMessageKey(key: MessageKey): Uint8Array {
  return new ByteWriter(false)
    .writeInt64(key.peerId)
    .writeInt32(key.namespace)
    .writeInt32(key.timestamp)
    .writeInt32(key.messageId)
    .finish();
}

/**
 * First 8 bytes of every message key belonging to a peer
 */
export function peerKeyPrefix(peerId: bigint): Uint8Array {
  return new ByteWriter(false).writeInt64(peerId).finish();
}

/**
 * Read forward info from a message value.
 * A zero flag byte means there is none and nothing further is consumed.
 */
export function readForwardInfo(reader: ByteReader): ForwardInfo | null {
  const flags = reader.readInt8();
  if (flags === 0) {
    return null;
  }

  const authorId = reader.readInt64();
  const date = reader.readInt32();

  if (flags & ForwardInfoFlags.SourceId) {
    reader.readInt64();
  }
  if (flags & ForwardInfoFlags.SourceMessage) {
    reader.readInt64(); // peer id
    reader.readInt32(); // namespace
    reader.readInt32(); // id
  }
  if (flags & ForwardInfoFlags.Signature) {
    reader.readString();
  }
  if (flags & ForwardInfoFlags.PsaType) {
    reader.readString();
  }
  if (flags & ForwardInfoFlags.Flags) {
    reader.readInt32();
  }

  return { authorId, date };
}

/**
 * Parse a message table value.
 * Only regular messages are supported; anything else, or a value that ends
 * early, is unparsable.
 */
export function parseMessageValue(data: Uint8Array): ParseResult<MessageValue> {
  const reader = new ByteReader(data);

  try {
    const discriminator = reader.readInt8();
    if (discriminator !== REGULAR_MESSAGE) {
      return unparsable(`Unsupported message kind: ${discriminator}`);
    }

    reader.readUint32(); // stable id
    reader.readUint32(); // stable version

    const dataFlags = reader.readUint8();
    if (dataFlags & MessageDataFlags.GloballyUniqueId) reader.readInt64();
    if (dataFlags & MessageDataFlags.GlobalTags) reader.readUint32();
    if (dataFlags & MessageDataFlags.GroupingKey) reader.readInt64();
    if (dataFlags & MessageDataFlags.GroupInfo) reader.readUint32();
    if (dataFlags & MessageDataFlags.LocalTags) reader.readUint32();
    if (dataFlags & MessageDataFlags.ThreadId) reader.readInt64();

    const flags = reader.readUint32();
    reader.readUint32(); // tags

    const forwardInfo = readForwardInfo(reader);

    let authorId: bigint | null = null;
    if (reader.readInt8() === 1) {
      authorId = reader.readInt64();
    }

    const text = reader.readString();

    return parsed({
      text,
      authorId,
      incoming: (flags & MessageFlags.Incoming) !== 0,
      forwardInfo,
    });
  } catch (error) {
    if (error instanceof TruncatedDataError) {
      return unparsable(error.message);
    }
    throw error;
  }
}

/**
 * Fields accepted by {@link encodeMessageValue}. Optional data-flag fields
 * are written when present.
 */
export interface MessageValueInit {
  text: string;
  incoming: boolean;
  authorId?: bigint | null;
  forwardInfo?: ForwardInfo | null;
  globallyUniqueId?: bigint;
  threadId?: bigint;
}

/**
 * Encode a regular message value
 */
export function encodeMessageValue(init: MessageValueInit): Uint8Array {
  const w = new ByteWriter();
  w.writeInt8(REGULAR_MESSAGE).writeUint32(1).writeUint32(1);

  let dataFlags = 0;
  if (init.globallyUniqueId !== undefined) dataFlags |= MessageDataFlags.GloballyUniqueId;
  if (init.threadId !== undefined) dataFlags |= MessageDataFlags.ThreadId;
  w.writeUint8(dataFlags);
  if (init.globallyUniqueId !== undefined) w.writeInt64(init.globallyUniqueId);
  if (init.threadId !== undefined) w.writeInt64(init.threadId);

  w.writeUint32(init.incoming ? MessageFlags.Incoming : 0).writeUint32(0);

  if (init.forwardInfo) {
    w.writeInt8(1).writeInt64(init.forwardInfo.authorId).writeInt32(init.forwardInfo.date);
  } else {
    w.writeInt8(0);
  }

  if (init.authorId !== undefined && init.authorId !== null) {
    w.writeInt8(1).writeInt64(init.authorId);
  } else {
    w.writeInt8(0);
  }

  return w.writeString(init.text).finish();
}

export const EMPTY_PEER: Readonly<Peer> = Object.freeze({
  firstName: '',
  lastName: '',
  username: '',
  title: '',
  phone: '',
});

/**
 * Parse a peer table value.
 * Looks for the root object under key "_" and decodes its nested stream.
 * Never fails: a record without a root object yields an all-empty peer.
 */
export function parsePeer(data: Uint8Array): Peer {
  const root = seekField(data, PEER_ROOT_KEY, ValueType.Object);
  if (!root) {
    return { ...EMPTY_PEER };
  }

  const fields = decodeAll(root.value.data);
  const text = (key: string): string => {
    const field = fields.get(key);
    return field?.type === ValueType.String ? field.value : '';
  };

  return {
    firstName: text('fn'),
    lastName: text('ln'),
    username: text('un'),
    title: text('t'),
    phone: text('p'),
  };
}

/**
 * Encode a peer table value (root object under "_")
 */
export function encodePeer(peer: Partial<Peer>, typeHash: number = 0): Uint8Array {
  const inner = new TaggedStreamEncoder();
  if (peer.firstName !== undefined) inner.putString('fn', peer.firstName);
  if (peer.lastName !== undefined) inner.putString('ln', peer.lastName);
  if (peer.username !== undefined) inner.putString('un', peer.username);
  if (peer.title !== undefined) inner.putString('t', peer.title);
  if (peer.phone !== undefined) inner.putString('p', peer.phone);
  return new TaggedStreamEncoder().putObject(PEER_ROOT_KEY, inner.finish(), typeHash).finish();
}

/**
 * Name to show for a peer: title, else "first last", else "@username", else "Unknown"
 */
export function peerDisplayName(peer: Peer): string {
  if (peer.title) {
    return peer.title;
  }
  const name = `${peer.firstName} ${peer.lastName}`.trim();
  if (name) {
    return name;
  }
  if (peer.username) {
    return `@${peer.username}`;
  }
  return 'Unknown';
}
