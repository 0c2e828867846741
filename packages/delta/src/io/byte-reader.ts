import { type ByteSource, readVarUint } from "../encoding/var-uint.js";
import { DeltaFormatError } from "../errors.js";

/**
 * Sequential read cursor over a byte array.
 *
 * Every read past the end of the data raises a {@link DeltaFormatError}.
 */
export class ByteReader implements ByteSource {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  /** Number of unread bytes */
  get remaining(): number {
    return this.data.length - this.pos;
  }

  hasBytes(): boolean {
    return this.pos < this.data.length;
  }

  readByte(): number {
    if (this.pos >= this.data.length) {
      throw new DeltaFormatError("unexpected end of delta", this.pos);
    }
    return this.data[this.pos++];
  }

  readVarUint(): number {
    return readVarUint(this);
  }

  /**
   * Read `count` bytes as a view into the underlying data (no copy).
   */
  readBytes(count: number): Uint8Array {
    if (count > this.remaining) {
      throw new DeltaFormatError(
        `unexpected end of delta: wanted ${count} bytes, have ${this.remaining}`,
        this.pos,
      );
    }
    const result = this.data.subarray(this.pos, this.pos + count);
    this.pos += count;
    return result;
  }
}
