import { TruncatedDataError } from '../errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Cursor over a byte buffer.
 * Tagged streams and message values are little-endian; message keys are big-endian.
 */
export class ByteReader {
  private readonly view: DataView;
  private offset: number;

  constructor(
    private readonly data: Uint8Array,
    offset: number = 0,
    private readonly littleEndian: boolean = true
  ) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  private take(size: number): number {
    if (size < 0 || this.offset + size > this.data.length) {
      throw new TruncatedDataError(
        `Unexpected end of data: need ${size} bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  readInt8(): number {
    return this.view.getInt8(this.take(1));
  }

  readUint8(): number {
    return this.view.getUint8(this.take(1));
  }

  readInt32(): number {
    return this.view.getInt32(this.take(4), this.littleEndian);
  }

  readUint32(): number {
    return this.view.getUint32(this.take(4), this.littleEndian);
  }

  readInt64(): bigint {
    return this.view.getBigInt64(this.take(8), this.littleEndian);
  }

  readDouble(): number {
    return this.view.getFloat64(this.take(8), this.littleEndian);
  }

  /**
   * Read exactly `size` raw bytes (a copy)
   */
  readRaw(size: number): Uint8Array {
    const at = this.take(size);
    return this.data.slice(at, at + size);
  }

  skip(size: number): void {
    this.take(size);
  }

  /**
   * int32 length + bytes
   */
  readBytes(): Uint8Array {
    return this.readRaw(this.readInt32());
  }

  /**
   * int32 length + UTF-8. Invalid sequences are replaced, never fatal.
   */
  readString(): string {
    return utf8.decode(this.readBytes());
  }

  /**
   * uint8 length + UTF-8
   */
  readShortString(): string {
    return utf8.decode(this.readRaw(this.readUint8()));
  }
}
