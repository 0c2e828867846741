/**
 * Size in bytes of the window covered by a {@link RollingHash}.
 */
export const ROLLING_WINDOW_SIZE = 16;

/**
 * Rolling hash over a fixed 16-byte window (Fossil / Adler pattern).
 *
 * `a` is the plain sum of the window bytes and `b` the sum of the running
 * `a` values, both kept modulo 2^16. The window itself is held in a ring so
 * that {@link next} only needs the byte entering the window.
 */
export class RollingHash {
  private readonly window = new Uint8Array(ROLLING_WINDOW_SIZE);
  private a = 0;
  private b = 0;
  private pos = 0;

  /**
   * Hash `buf[offset..offset+16)` from scratch.
   * The caller guarantees that 16 bytes are available at `offset`.
   * @returns this (for chaining)
   */
  init(buf: Uint8Array, offset: number): this {
    let a = 0;
    let b = 0;
    for (let i = 0; i < ROLLING_WINDOW_SIZE; i++) {
      const c = buf[offset + i];
      this.window[i] = c;
      a = (a + c) & 0xffff;
      b = (b + a) & 0xffff;
    }
    this.a = a;
    this.b = b;
    this.pos = 0;
    return this;
  }

  /**
   * Slide the window forward by one byte.
   * @param addByte - Byte entering the window
   * @returns The new hash value
   */
  next(addByte: number): number {
    const removeByte = this.window[this.pos];
    this.window[this.pos] = addByte;
    this.pos = (this.pos + 1) % ROLLING_WINDOW_SIZE;
    this.a = (this.a - removeByte + addByte) & 0xffff;
    this.b = (this.b - ROLLING_WINDOW_SIZE * removeByte + this.a) & 0xffff;
    return this.value();
  }

  /**
   * Current 32-bit hash: low 16 bits from the byte sum, high 16 from the
   * weighted sum.
   */
  value(): number {
    return (this.a | (this.b << 16)) >>> 0;
  }

  get windowSize(): number {
    return ROLLING_WINDOW_SIZE;
  }

  reset(): void {
    this.window.fill(0);
    this.a = 0;
    this.b = 0;
    this.pos = 0;
  }
}
