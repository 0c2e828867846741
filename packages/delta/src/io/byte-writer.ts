import { type ByteSink, writeVarUint } from "../encoding/var-uint.js";

/**
 * Growable append-only byte buffer.
 */
export class ByteWriter implements ByteSink {
  private buffer: Uint8Array;
  private size = 0;

  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  /** Number of bytes written so far */
  get length(): number {
    return this.size;
  }

  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.size++] = value;
  }

  writeVarUint(value: number): void {
    writeVarUint(this, value);
  }

  /**
   * Append `count` bytes of `bytes` starting at `offset`.
   */
  writeBytes(bytes: Uint8Array, offset = 0, count = bytes.length - offset): void {
    if (count === 0) return;
    this.ensureCapacity(count);
    this.buffer.set(bytes.subarray(offset, offset + count), this.size);
    this.size += count;
  }

  /**
   * Copy of the written bytes.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  private ensureCapacity(extra: number): void {
    const required = this.size + extra;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.size));
    this.buffer = grown;
  }
}
