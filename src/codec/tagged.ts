import { ByteReader } from './reader.js';
import {
  ValueType,
  type TaggedField,
  type TaggedObject,
  type TaggedValue,
  type TaggedValueOf,
} from './types.js';
import { ArchiveError, TruncatedDataError, UnknownValueTypeError } from '../errors.js';

function toValueType(tag: number): ValueType {
  if (tag < ValueType.Int32 || tag > ValueType.BytesArray) {
    throw new UnknownValueTypeError(tag);
  }
  return tag;
}

function isValueOf<T extends ValueType>(value: TaggedValue, type: T): value is TaggedValueOf<T> {
  return value.type === type;
}

function readObject(reader: ByteReader): TaggedObject {
  const typeHash = reader.readInt32();
  return { typeHash, data: reader.readBytes() };
}

function skipObject(reader: ByteReader): void {
  reader.skip(4);
  reader.skip(reader.readInt32());
}

/**
 * Element count of an array or dictionary. Negative counts are malformed.
 */
function readCount(reader: ByteReader): number {
  const count = reader.readInt32();
  if (count < 0) {
    throw new TruncatedDataError(`Negative element count: ${count}`);
  }
  return count;
}

function repeat<T>(count: number, read: () => T): T[] {
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    items.push(read());
  }
  return items;
}

/**
 * Read the payload of a value whose tag has already been consumed
 */
export function readValue(reader: ByteReader, type: ValueType): TaggedValue {
  switch (type) {
    case ValueType.Int32:
      return { type, value: reader.readInt32() };
    case ValueType.Int64:
      return { type, value: reader.readInt64() };
    case ValueType.Bool:
      return { type, value: reader.readUint8() !== 0 };
    case ValueType.Double:
      return { type, value: reader.readDouble() };
    case ValueType.String:
      return { type, value: reader.readString() };
    case ValueType.Object:
      return { type, value: readObject(reader) };
    case ValueType.Int32Array:
      return { type, value: repeat(readCount(reader), () => reader.readInt32()) };
    case ValueType.Int64Array:
      return { type, value: repeat(readCount(reader), () => reader.readInt64()) };
    case ValueType.ObjectArray:
      return { type, value: repeat(readCount(reader), () => readObject(reader)) };
    case ValueType.ObjectDictionary: {
      const count = readCount(reader);
      for (let i = 0; i < count; i++) {
        skipObject(reader);
        skipObject(reader);
      }
      return { type, value: count };
    }
    case ValueType.Bytes:
      return { type, value: reader.readBytes() };
    case ValueType.Nil:
      return { type, value: null };
    case ValueType.StringArray:
      return { type, value: repeat(readCount(reader), () => reader.readString()) };
    case ValueType.BytesArray:
      return { type, value: repeat(readCount(reader), () => reader.readBytes()) };
  }
}

/**
 * Advance past a value without materializing it.
 * Consumes exactly as many bytes as {@link readValue} would.
 */
export function skipValue(reader: ByteReader, type: ValueType): void {
  switch (type) {
    case ValueType.Bool:
      reader.skip(1);
      break;
    case ValueType.Int32:
      reader.skip(4);
      break;
    case ValueType.Int64:
    case ValueType.Double:
      reader.skip(8);
      break;
    case ValueType.String:
    case ValueType.Bytes:
      reader.skip(reader.readInt32());
      break;
    case ValueType.Object:
      skipObject(reader);
      break;
    case ValueType.Int32Array:
      reader.skip(readCount(reader) * 4);
      break;
    case ValueType.Int64Array:
      reader.skip(readCount(reader) * 8);
      break;
    case ValueType.ObjectArray: {
      const count = readCount(reader);
      for (let i = 0; i < count; i++) skipObject(reader);
      break;
    }
    case ValueType.ObjectDictionary: {
      const count = readCount(reader);
      for (let i = 0; i < count; i++) {
        skipObject(reader);
        skipObject(reader);
      }
      break;
    }
    case ValueType.Nil:
      break;
    case ValueType.StringArray:
    case ValueType.BytesArray: {
      const count = readCount(reader);
      for (let i = 0; i < count; i++) reader.skip(reader.readInt32());
      break;
    }
  }
}

/**
 * Decode one record starting at `offset`.
 * Pure: returns the field and the offset just past it.
 * @throws TruncatedDataError or UnknownValueTypeError on malformed input
 */
export function readField(data: Uint8Array, offset: number): { field: TaggedField; next: number } {
  const reader = new ByteReader(data, offset);
  const key = reader.readShortString();
  const type = toValueType(reader.readUint8());
  const value = readValue(reader, type);
  return { field: { key, value }, next: reader.position };
}

/**
 * Decode every record of a stream into a map.
 * Duplicate keys: the last occurrence wins. Stops at the first malformed
 * record and returns what was decoded up to that point.
 */
export function decodeAll(data: Uint8Array): Map<string, TaggedValue> {
  const fields = new Map<string, TaggedValue>();
  let offset = 0;
  while (offset < data.length) {
    try {
      const { field, next } = readField(data, offset);
      fields.set(field.key, field.value);
      offset = next;
    } catch (error) {
      if (error instanceof ArchiveError) break;
      throw error;
    }
  }
  return fields;
}

/**
 * Find the first record with the given key and type tag.
 * Non-matching values are skipped, not decoded. Returns undefined when the
 * field is absent or the stream turns malformed before it is reached.
 */
export function seekField<T extends ValueType>(
  data: Uint8Array,
  key: string,
  type: T
): TaggedValueOf<T> | undefined {
  const reader = new ByteReader(data);
  try {
    while (reader.remaining > 0) {
      const k = reader.readShortString();
      const tag = toValueType(reader.readUint8());
      if (k === key && tag === type) {
        const value = readValue(reader, tag);
        if (isValueOf(value, type)) return value;
        continue;
      }
      skipValue(reader, tag);
    }
  } catch (error) {
    if (!(error instanceof ArchiveError)) throw error;
  }
  return undefined;
}

export function getString(data: Uint8Array, key: string): string | undefined {
  return seekField(data, key, ValueType.String)?.value;
}

export function getInt32(data: Uint8Array, key: string): number | undefined {
  return seekField(data, key, ValueType.Int32)?.value;
}

export function getInt64(data: Uint8Array, key: string): bigint | undefined {
  return seekField(data, key, ValueType.Int64)?.value;
}

export function getObject(data: Uint8Array, key: string): TaggedObject | undefined {
  return seekField(data, key, ValueType.Object)?.value;
}
