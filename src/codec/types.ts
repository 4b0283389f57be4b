/**
 * Type tags of the tagged-value stream format
 */
export enum ValueType {
  Int32 = 0,
  Int64 = 1,
  Bool = 2,
  Double = 3,
  String = 4,
  Object = 5,
  Int32Array = 6,
  Int64Array = 7,
  ObjectArray = 8,
  ObjectDictionary = 9,
  Bytes = 10,
  Nil = 11,
  StringArray = 12,
  BytesArray = 13,
}

/**
 * An encoded nested object: an opaque type hash plus a complete tagged stream
 */
export interface TaggedObject {
  typeHash: number;
  data: Uint8Array;
}

/**
 * A decoded value, discriminated by its type tag
 */
export type TaggedValue =
  | { type: ValueType.Int32; value: number }
  | { type: ValueType.Int64; value: bigint }
  | { type: ValueType.Bool; value: boolean }
  | { type: ValueType.Double; value: number }
  | { type: ValueType.String; value: string }
  | { type: ValueType.Object; value: TaggedObject }
  | { type: ValueType.Int32Array; value: number[] }
  | { type: ValueType.Int64Array; value: bigint[] }
  | { type: ValueType.ObjectArray; value: TaggedObject[] }
  // Dictionary contents are skipped; only the entry count is kept
  | { type: ValueType.ObjectDictionary; value: number }
  | { type: ValueType.Bytes; value: Uint8Array }
  | { type: ValueType.Nil; value: null }
  | { type: ValueType.StringArray; value: string[] }
  | { type: ValueType.BytesArray; value: Uint8Array[] };

/**
 * Narrow a tagged value to the variant carrying tag T
 */
export type TaggedValueOf<T extends ValueType> = Extract<TaggedValue, { type: T }>;

/**
 * One record of a tagged stream
 */
export interface TaggedField {
  key: string;
  value: TaggedValue;
}

/**
 * Message table key size in bytes
 */
export const MESSAGE_KEY_SIZE = 20;

/**
 * Message table key (20 bytes, big-endian)
 * [0-7]    peerId      (int64)
 * [8-11]   namespace   (int32)
 * [12-15]  timestamp   (int32, unix seconds)
 * [16-19]  messageId   (int32)
 */
export interface MessageKey {
  peerId: bigint;
  namespace: number;
  timestamp: number;
  messageId: number;
}

/**
 * Message store flags (uint32). Only Incoming is used downstream.
 */
export enum MessageFlags {
  Unsent = 1,
  Failed = 2,
  Incoming = 4,
  TopIndexable = 16,
  Sending = 32,
  WasScheduled = 128,
  CountedAsIncoming = 256,
}

/**
 * Presence bits for the optional fields of a message value (uint8)
 */
export enum MessageDataFlags {
  GloballyUniqueId = 1 << 0,
  GlobalTags = 1 << 1,
  GroupingKey = 1 << 2,
  GroupInfo = 1 << 3,
  LocalTags = 1 << 4,
  ThreadId = 1 << 5,
}

/**
 * Presence bits for the optional fields of forward info (int8)
 */
export enum ForwardInfoFlags {
  SourceId = 1 << 1,
  SourceMessage = 1 << 2,
  Signature = 1 << 3,
  PsaType = 1 << 4,
  Flags = 1 << 5,
}

/**
 * Discriminator of a regular message value; others are not supported
 */
export const REGULAR_MESSAGE = 0;

export interface ForwardInfo {
  authorId: bigint;
  date: number;
}

/**
 * Decoded message value
 */
export interface MessageValue {
  text: string;
  authorId: bigint | null;
  incoming: boolean;
  forwardInfo: ForwardInfo | null;
}

/**
 * Peer fields as stored under the root object of a peer record
 */
export interface Peer {
  firstName: string;
  lastName: string;
  username: string;
  title: string;
  phone: string;
}
