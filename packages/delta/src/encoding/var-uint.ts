/**
 * Variable-length unsigned integer encoding
 *
 * Small values take a single byte; the first byte of longer encodings
 * selects the layout:
 *
 * | first byte | size | value                          |
 * | ---------- | ---- | ------------------------------ |
 * | 0-240      | 1    | the byte itself                |
 * | 241-248    | 2    | 240 + 256 * (b0 - 241) + b1    |
 * | 249        | 3    | 2288 + 256 * b1 + b2           |
 * | 250-255    | 4-9  | b0 - 247 little-endian bytes   |
 */

import { DeltaFormatError } from "../errors.js";

/**
 * Largest value of each encoded size, indexed by size - 1.
 * Sizes 8 (up to 2^56 - 1) and 9 cover the rest; of those only size 8 is
 * reachable with safe integers.
 */
export const VAR_UINT_LIMITS = [
  240,
  2287,
  67823,
  16777215,
  4294967295,
  1099511627775,
  281474976710655,
] as const;

/**
 * Anything a var-uint can be appended to
 */
export interface ByteSink {
  writeByte(value: number): void;
}

/**
 * Anything a var-uint can be read from
 */
export interface ByteSource {
  readonly position: number;
  readByte(): number;
}

function assertVarUint(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`var-uint value must be a non-negative safe integer, got ${value}`);
  }
}

/**
 * Calculate the number of bytes needed to encode a value
 */
export function varUintSize(value: number): number {
  assertVarUint(value);
  for (let i = 0; i < VAR_UINT_LIMITS.length; i++) {
    if (value <= VAR_UINT_LIMITS[i]) {
      return i + 1;
    }
  }
  return 8;
}

/**
 * Append the encoding of `value` to a sink
 */
export function writeVarUint(sink: ByteSink, value: number): void {
  assertVarUint(value);
  if (value <= 240) {
    sink.writeByte(value);
    return;
  }
  if (value <= 2287) {
    const v = value - 240;
    sink.writeByte(241 + (v >>> 8));
    sink.writeByte(v & 0xff);
    return;
  }
  if (value <= 67823) {
    const v = value - 2288;
    sink.writeByte(249);
    sink.writeByte(v >>> 8);
    sink.writeByte(v & 0xff);
    return;
  }

  // Values beyond 32 bits do not survive bitwise operators
  const count = varUintSize(value) - 1;
  sink.writeByte(247 + count);
  let v = value;
  for (let i = 0; i < count; i++) {
    sink.writeByte(v % 256);
    v = Math.floor(v / 256);
  }
}

/**
 * Read one var-uint from a source
 *
 * @throws DeltaFormatError if the value does not fit a safe integer
 */
export function readVarUint(source: ByteSource): number {
  const start = source.position;
  const b0 = source.readByte();
  if (b0 <= 240) {
    return b0;
  }
  if (b0 <= 248) {
    return 240 + 256 * (b0 - 241) + source.readByte();
  }
  if (b0 === 249) {
    const hi = source.readByte();
    const lo = source.readByte();
    return 2288 + 256 * hi + lo;
  }

  const count = b0 - 247;
  let value = 0;
  let scale = 1;
  for (let i = 0; i < count; i++) {
    value += source.readByte() * scale;
    scale *= 256;
  }
  if (value > Number.MAX_SAFE_INTEGER) {
    throw new DeltaFormatError("var-uint exceeds the safe integer range", start);
  }
  return value;
}

/**
 * Encode a single value into a fresh array
 */
export function encodeVarUint(value: number): Uint8Array {
  const bytes: number[] = [];
  writeVarUint({ writeByte: (b) => bytes.push(b) }, value);
  return new Uint8Array(bytes);
}
