// Byte cursor: little-endian reads over a fully buffered input, and a growable writer

import { MarshalError, ERR_EOF } from "./errors";

export class ByteReader {
  private readonly buf: Buffer;
  private off = 0;

  constructor(bytes: Uint8Array) {
    this.buf = Buffer.isBuffer(bytes)
      ? bytes
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.off;
  }

  get remaining(): number {
    return this.buf.length - this.off;
  }

  get length(): number {
    return this.buf.length;
  }

  /** Throws ERR_EOF unless `n` more bytes are available. */
  require(n: number, what = "value"): void {
    if (n > this.buf.length - this.off) {
      throw new MarshalError(ERR_EOF, `truncated ${what}`, this.off);
    }
  }

  readU8(): number {
    this.require(1, "byte");
    return this.buf[this.off++];
  }

  readU16LE(): number {
    this.require(2, "u16");
    const v = this.buf.readUInt16LE(this.off);
    this.off += 2;
    return v;
  }

  readU32LE(): number {
    this.require(4, "u32");
    const v = this.buf.readUInt32LE(this.off);
    this.off += 4;
    return v;
  }

  readI32LE(): number {
    this.require(4, "i32");
    const v = this.buf.readInt32LE(this.off);
    this.off += 4;
    return v;
  }

  readI64LE(): bigint {
    this.require(8, "i64");
    const v = this.buf.readBigInt64LE(this.off);
    this.off += 8;
    return v;
  }

  readF64LE(): number {
    this.require(8, "f64");
    const v = this.buf.readDoubleLE(this.off);
    this.off += 8;
    return v;
  }

  /** Copy of the next `n` bytes; the result does not alias the input. */
  readExact(n: number): Buffer {
    this.require(n, "bytes");
    const out = Buffer.from(this.buf.subarray(this.off, this.off + n));
    this.off += n;
    return out;
  }
}

export class ByteWriter {
  private buf: Buffer;
  private off = 0;

  constructor(initialSize = 256) {
    this.buf = Buffer.alloc(initialSize);
  }

  get position(): number {
    return this.off;
  }

  private grow(n: number): void {
    if (this.off + n <= this.buf.length) return;
    let c = this.buf.length || 1;
    while (c < this.off + n) c *= 2;
    const nb = Buffer.alloc(c);
    this.buf.copy(nb, 0, 0, this.off);
    this.buf = nb;
  }

  writeU8(v: number): void {
    this.grow(1);
    this.buf[this.off++] = v & 0xff;
  }

  writeU16LE(v: number): void {
    this.grow(2);
    this.off = this.buf.writeUInt16LE(v, this.off);
  }

  writeU32LE(v: number): void {
    this.grow(4);
    this.off = this.buf.writeUInt32LE(v >>> 0, this.off);
  }

  writeI32LE(v: number): void {
    this.grow(4);
    this.off = this.buf.writeInt32LE(v, this.off);
  }

  writeI64LE(v: bigint): void {
    this.grow(8);
    this.off = this.buf.writeBigInt64LE(v, this.off);
  }

  writeF64LE(v: number): void {
    this.grow(8);
    this.off = this.buf.writeDoubleLE(v, this.off);
  }

  writeBytes(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buf.set(bytes, this.off);
    this.off += bytes.length;
  }

  /** The written bytes, as a fresh Buffer. */
  finish(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.off));
  }
}
