import { ValueType, type TaggedValue, type TaggedObject } from './types.js';
import { concatBytes } from '../crypto/utils.js';

const utf8 = new TextEncoder();

/**
 * Growable little-endian byte writer
 */
export class ByteWriter {
  private chunks: Uint8Array[] = [];

  constructor(private readonly littleEndian: boolean = true) {}

  private fixed(size: number, write: (view: DataView) => void): this {
    const chunk = new Uint8Array(size);
    write(new DataView(chunk.buffer));
    this.chunks.push(chunk);
    return this;
  }

  writeInt8(value: number): this {
    return this.fixed(1, (v) => v.setInt8(0, value));
  }

  writeUint8(value: number): this {
    return this.fixed(1, (v) => v.setUint8(0, value));
  }

  writeInt32(value: number): this {
    return this.fixed(4, (v) => v.setInt32(0, value, this.littleEndian));
  }

  writeUint32(value: number): this {
    return this.fixed(4, (v) => v.setUint32(0, value, this.littleEndian));
  }

  writeInt64(value: bigint): this {
    return this.fixed(8, (v) => v.setBigInt64(0, value, this.littleEndian));
  }

  writeDouble(value: number): this {
    return this.fixed(8, (v) => v.setFloat64(0, value, this.littleEndian));
  }

  writeRaw(bytes: Uint8Array): this {
    this.chunks.push(bytes.slice());
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    return this.writeInt32(bytes.length).writeRaw(bytes);
  }

  writeString(value: string): this {
    return this.writeBytes(utf8.encode(value));
  }

  writeShortString(value: string): this {
    const bytes = utf8.encode(value);
    if (bytes.length > 0xff) {
      throw new Error(`Short string too long: ${bytes.length} > 255 bytes`);
    }
    return this.writeUint8(bytes.length).writeRaw(bytes);
  }

  writeObject(object: TaggedObject): this {
    return this.writeInt32(object.typeHash).writeBytes(object.data);
  }

  finish(): Uint8Array {
    return concatBytes(...this.chunks);
  }
}

/**
 * Builder for tagged streams (key + type tag + payload, repeated)
 */
export class TaggedStreamEncoder {
  private readonly writer = new ByteWriter();

  /**
   * Append a record. Dictionary entries are given as key/value object pairs.
   */
  put(key: string, value: Exclude<TaggedValue, { type: ValueType.ObjectDictionary }>): this {
    const w = this.writer;
    w.writeShortString(key).writeUint8(value.type);

    switch (value.type) {
      case ValueType.Int32:
        w.writeInt32(value.value);
        break;
      case ValueType.Int64:
        w.writeInt64(value.value);
        break;
      case ValueType.Bool:
        w.writeUint8(value.value ? 1 : 0);
        break;
      case ValueType.Double:
        w.writeDouble(value.value);
        break;
      case ValueType.String:
        w.writeString(value.value);
        break;
      case ValueType.Object:
        w.writeObject(value.value);
        break;
      case ValueType.Int32Array:
        w.writeInt32(value.value.length);
        for (const item of value.value) w.writeInt32(item);
        break;
      case ValueType.Int64Array:
        w.writeInt32(value.value.length);
        for (const item of value.value) w.writeInt64(item);
        break;
      case ValueType.ObjectArray:
        w.writeInt32(value.value.length);
        for (const item of value.value) w.writeObject(item);
        break;
      case ValueType.Bytes:
        w.writeBytes(value.value);
        break;
      case ValueType.Nil:
        break;
      case ValueType.StringArray:
        w.writeInt32(value.value.length);
        for (const item of value.value) w.writeString(item);
        break;
      case ValueType.BytesArray:
        w.writeInt32(value.value.length);
        for (const item of value.value) w.writeBytes(item);
        break;
    }
    return this;
  }

  putDictionary(key: string, entries: Array<[TaggedObject, TaggedObject]>): this {
    this.writer.writeShortString(key).writeUint8(ValueType.ObjectDictionary);
    this.writer.writeInt32(entries.length);
    for (const [k, v] of entries) {
      this.writer.writeObject(k).writeObject(v);
    }
    return this;
  }

  putInt32(key: string, value: number): this {
    return this.put(key, { type: ValueType.Int32, value });
  }

  putInt64(key: string, value: bigint): this {
    return this.put(key, { type: ValueType.Int64, value });
  }

  putString(key: string, value: string): this {
    return this.put(key, { type: ValueType.String, value });
  }

  putObject(key: string, data: Uint8Array, typeHash: number = 0): this {
    return this.put(key, { type: ValueType.Object, value: { typeHash, data } });
  }

  finish(): Uint8Array {
    return this.writer.finish();
  }
}
