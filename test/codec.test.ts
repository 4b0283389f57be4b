import { describe, it, expect } from 'vitest';
import {
  ValueType,
  ByteReader,
  ByteWriter,
  TaggedStreamEncoder,
  decodeAll,
  seekField,
  readField,
  getString,
  getInt32,
  getInt64,
  getObject,
  type TaggedValue,
} from '../src/codec/index.js';
import { TruncatedDataError, UnknownValueTypeError } from '../src/errors.js';
import { bytesToHex } from '../src/crypto/index.js';

const bytes = (...values: number[]) => new Uint8Array(values);

describe('ByteReader', () => {
  it('should read little-endian integers by default', () => {
    const reader = new ByteReader(bytes(0x01, 0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff));
    expect(reader.readInt32()).toBe(1);
    expect(reader.readInt32()).toBe(-1);
    expect(reader.remaining).toBe(0);
  });

  it('should read big-endian integers when asked', () => {
    const reader = new ByteReader(bytes(0x00, 0x00, 0x01, 0x00), 0, false);
    expect(reader.readInt32()).toBe(256);
  });

  it('should throw TruncatedDataError past the end', () => {
    const reader = new ByteReader(bytes(0x01, 0x02));
    expect(() => reader.readInt32()).toThrow(TruncatedDataError);
  });

  it('should reject negative lengths', () => {
    const reader = new ByteReader(bytes(0xff, 0xff, 0xff, 0xff));
    expect(() => reader.readBytes()).toThrow(TruncatedDataError);
  });

  it('should replace invalid UTF-8 instead of failing', () => {
    const reader = new ByteReader(bytes(0x02, 0x00, 0x00, 0x00, 0x41, 0xff));
    expect(reader.readString()).toBe('A\uFFFD');
  });

  it('should read short strings with a one-byte length', () => {
    const reader = new ByteReader(bytes(0x02, 0x66, 0x6e));
    expect(reader.readShortString()).toBe('fn');
  });
});

describe('Tagged stream codec', () => {
  const nested = new TaggedStreamEncoder().putString('inner', 'deep').finish();

  const samples: Array<[string, Exclude<TaggedValue, { type: ValueType.ObjectDictionary }>]> = [
    ['i32', { type: ValueType.Int32, value: -123456 }],
    ['i64', { type: ValueType.Int64, value: -9007199254740993n }],
    ['bool', { type: ValueType.Bool, value: true }],
    ['dbl', { type: ValueType.Double, value: 3.25 }],
    ['str', { type: ValueType.String, value: 'héllo 👋' }],
    ['obj', { type: ValueType.Object, value: { typeHash: 0x1234, data: nested } }],
    ['i32a', { type: ValueType.Int32Array, value: [1, -2, 3] }],
    ['i64a', { type: ValueType.Int64Array, value: [1n, -(2n ** 40n)] }],
    [
      'obja',
      {
        type: ValueType.ObjectArray,
        value: [
          { typeHash: 1, data: nested },
          { typeHash: -2, data: new Uint8Array(0) },
        ],
      },
    ],
    ['raw', { type: ValueType.Bytes, value: bytes(0, 1, 2, 255) }],
    ['nil', { type: ValueType.Nil, value: null }],
    ['stra', { type: ValueType.StringArray, value: ['a', '', 'ccc'] }],
    ['rawa', { type: ValueType.BytesArray, value: [bytes(9), bytes()] }],
  ];

  const encodeSamples = () => {
    const encoder = new TaggedStreamEncoder();
    for (const [key, value] of samples) {
      encoder.put(key, value);
    }
    encoder.putDictionary('dict', [
      [{ typeHash: 5, data: bytes(1, 2) }, { typeHash: 6, data: bytes(3) }],
      [{ typeHash: 7, data: bytes() }, { typeHash: 8, data: bytes(4, 5, 6) }],
    ]);
    encoder.putInt32('tail', 99);
    return encoder.finish();
  };

  describe('decodeAll', () => {
    it('should decode every tag type back to its value', () => {
      const fields = decodeAll(encodeSamples());

      for (const [key, value] of samples) {
        expect(fields.get(key)).toEqual(value);
      }
      expect(fields.get('dict')).toEqual({ type: ValueType.ObjectDictionary, value: 2 });
      expect(fields.get('tail')).toEqual({ type: ValueType.Int32, value: 99 });
      expect(fields.size).toBe(samples.length + 2);
    });

    it('should keep the last occurrence of a duplicate key', () => {
      const data = new TaggedStreamEncoder()
        .putString('k', 'first')
        .putInt32('x', 1)
        .putString('k', 'second')
        .finish();

      expect(decodeAll(data).get('k')).toEqual({ type: ValueType.String, value: 'second' });
    });

    it('should return what was decoded before a truncation', () => {
      const data = new TaggedStreamEncoder()
        .putInt32('a', 1)
        .putString('b', 'cut short')
        .finish();

      const fields = decodeAll(data.slice(0, data.length - 3));
      expect(fields.get('a')).toEqual({ type: ValueType.Int32, value: 1 });
      expect(fields.has('b')).toBe(false);
    });

    it('should stop at an unknown type tag', () => {
      const data = new ByteWriter()
        .writeRaw(new TaggedStreamEncoder().putInt32('a', 1).finish())
        .writeShortString('z')
        .writeUint8(42)
        .writeInt32(7)
        .finish();

      const fields = decodeAll(data);
      expect([...fields.keys()]).toEqual(['a']);
    });

    it('should decode an empty stream to an empty map', () => {
      expect(decodeAll(new Uint8Array(0)).size).toBe(0);
    });
  });

  describe('readField', () => {
    it('should report the offset just past the record', () => {
      const data = new TaggedStreamEncoder().putInt64('id', 5n).putInt32('n', 2).finish();
      const first = readField(data, 0);

      // 1 (key length) + 2 (key) + 1 (tag) + 8 (int64)
      expect(first.next).toBe(12);
      expect(first.field).toEqual({ key: 'id', value: { type: ValueType.Int64, value: 5n } });
      expect(readField(data, first.next).field.key).toBe('n');
    });

    it('should throw UnknownValueTypeError for tags outside the format', () => {
      const data = new ByteWriter().writeShortString('k').writeUint8(14).finish();
      expect(() => readField(data, 0)).toThrow(UnknownValueTypeError);
    });
  });

  describe('seekField', () => {
    it('should agree with decodeAll on every key', () => {
      const data = encodeSamples();
      const all = decodeAll(data);

      for (const [key, value] of all) {
        expect(seekField(data, key, value.type)).toEqual(value);
      }
    });

    it('should skip a same-key field of another type', () => {
      const data = new TaggedStreamEncoder()
        .putInt32('v', 10)
        .putString('v', 'ten')
        .finish();

      expect(seekField(data, 'v', ValueType.String)?.value).toBe('ten');
      expect(seekField(data, 'v', ValueType.Int32)?.value).toBe(10);
    });

    it('should return the first match when keys repeat', () => {
      const data = new TaggedStreamEncoder()
        .putString('k', 'first')
        .putString('k', 'second')
        .finish();

      expect(getString(data, 'k')).toBe('first');
    });

    it('should return undefined for an absent field', () => {
      const data = encodeSamples();
      expect(seekField(data, 'missing', ValueType.Int32)).toBeUndefined();
      expect(seekField(data, 'str', ValueType.Int32)).toBeUndefined();
    });

    it('should return undefined when the stream turns malformed first', () => {
      const data = new TaggedStreamEncoder()
        .putString('a', 'x')
        .putInt32('b', 2)
        .finish();

      expect(getInt32(data.slice(0, data.length - 1), 'b')).toBeUndefined();
      expect(getString(data.slice(0, data.length - 1), 'a')).toBe('x');
    });

    it('should stop at a negative array count the same way decodeAll does', () => {
      for (const type of [ValueType.Int32Array, ValueType.Int64Array, ValueType.StringArray]) {
        const data = new ByteWriter()
          .writeShortString('arr')
          .writeUint8(type)
          .writeInt32(-1)
          .writeRaw(new TaggedStreamEncoder().putString('name', 'x').finish())
          .finish();

        expect(decodeAll(data).size).toBe(0);
        expect(getString(data, 'name')).toBeUndefined();
        expect(() => readField(data, 0)).toThrow(TruncatedDataError);
      }
    });
  });

  describe('typed getters', () => {
    it('should read fields after values they must skip', () => {
      const data = encodeSamples();
      expect(getInt32(data, 'tail')).toBe(99);
      expect(getInt64(data, 'i64')).toBe(-9007199254740993n);
      expect(getString(data, 'str')).toBe('héllo 👋');

      const obj = getObject(data, 'obj');
      expect(obj?.typeHash).toBe(0x1234);
      expect(getString(obj?.data ?? new Uint8Array(0), 'inner')).toBe('deep');
    });
  });

  describe('TaggedStreamEncoder', () => {
    it('should lay out a record as key, tag, payload', () => {
      const data = new TaggedStreamEncoder().putInt32('n', 258).finish();
      expect(bytesToHex(data)).toBe('016e00' + '02010000');
    });

    it('should reject keys longer than 255 bytes', () => {
      expect(() => new TaggedStreamEncoder().putInt32('k'.repeat(256), 1)).toThrow(
        'Short string too long'
      );
    });
  });
});
