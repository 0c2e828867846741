import { RollingHash } from "@bindelta/hash";
import { describe, expect, it } from "vitest";
import { MAX_PROBES } from "../../src/constants.js";
import { findMatch } from "../../src/delta/matcher.js";
import { buildSourceIndex } from "../../src/delta/source-index.js";
import { concat, createRandom, encode, randomBytes } from "../test-data.js";

function windowHash(target: Uint8Array, offset: number): number {
  return new RollingHash().init(target, offset).value();
}

/**
 * A 16-byte block with the same rolling hash as sixteen 100s.
 * Adding (+m, -2m, +m) to three consecutive bytes keeps both the byte sum
 * and the weighted sum unchanged.
 */
function sameHashVariant(m1: number, m2: number): Uint8Array {
  const block = new Uint8Array(16).fill(100);
  block[0] += m1;
  block[1] -= 2 * m1;
  block[2] += m1;
  block[3] += m2;
  block[4] -= 2 * m2;
  block[5] += m2;
  return block;
}

function variants(count: number): Uint8Array[] {
  const result: Uint8Array[] = [];
  for (let m1 = 1; m1 <= 50 && result.length < count; m1++) {
    for (let m2 = 0; m2 < 50 && result.length < count; m2++) {
      result.push(sameHashVariant(m1, m2));
    }
  }
  return result;
}

describe("findMatch", () => {
  const repeated = encode("ABCDEFGHABCDEFGHABCDEFGHABCDEFGH");

  it("returns undefined for an empty index", () => {
    const index = buildSourceIndex(encode("short"));
    const target = encode("0123456789abcdefghij");
    expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toBeUndefined();
  });

  it("finds a block-aligned match after a literal prefix", () => {
    const index = buildSourceIndex(repeated);
    const target = encode("XYABCDEFGHABCDEFGHZZ");

    expect(findMatch(index, target, windowHash(target, 2), 0, 2)).toEqual({
      start: 16,
      len: 16,
      literalLen: 2,
    });
  });

  it("keeps the first of equally long candidates", () => {
    // Blocks 0 and 1 both match 16 bytes; block 1 is probed first
    const index = buildSourceIndex(repeated);
    const target = encode("ABCDEFGHABCDEFGH!!");

    expect(findMatch(index, target, windowHash(target, 0), 0, 0)?.start).toBe(16);
  });

  it("prefers a strictly longer later candidate", () => {
    const block = encode("ABCDEFGHABCDEFGH");
    const source = concat(block, encode("0123456789abcdef"), block);
    const index = buildSourceIndex(source);
    const target = concat(block, encode("01234567"));

    // Block 2 matches 16 bytes, block 0 goes on through "01234567"
    expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toEqual({
      start: 0,
      len: 24,
      literalLen: 0,
    });
  });

  it("extends the match backwards into the literal prefix", () => {
    const source = randomBytes(64, createRandom(11));
    const target = source.slice(10, 50);
    const index = buildSourceIndex(source);

    // target[6] is source[16], the start of block 1
    expect(findMatch(index, target, windowHash(target, 6), 0, 6)).toEqual({
      start: 10,
      len: 40,
      literalLen: 0,
    });
  });

  it("does not extend backwards past the scan base", () => {
    const source = randomBytes(64, createRandom(11));
    const target = source.slice(10, 50);
    const index = buildSourceIndex(source);

    expect(findMatch(index, target, windowHash(target, 6), 4, 2)).toEqual({
      start: 14,
      len: 36,
      literalLen: 0,
    });
  });

  it("rejects a match shorter than its encoding", () => {
    // A single block: every window probes it
    const index = buildSourceIndex(encode("ABCDEFGHIJKLMNOPQ"));
    const target = encode("ABCDExxxxxxxxxxxxxxx");

    expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toBeUndefined();
  });

  it("accepts a match as long as its encoding", () => {
    const index = buildSourceIndex(encode("ABCDEFGHIJKLMNOPQ"));
    const target = encode("ABCDEFxxxxxxxxxxxxxx");

    expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toEqual({
      start: 0,
      len: 6,
      literalLen: 0,
    });
  });

  it("counts the literal prefix header in the cost", () => {
    // 300 literal bytes need a two-byte length: a 6-byte match no longer pays
    const index = buildSourceIndex(encode("ABCDEFGHIJKLMNOPQ"));
    const target = concat(new Uint8Array(300).fill(0x78), encode("ABCDEFxxxxxxxxxxxxxx"));

    expect(findMatch(index, target, windowHash(target, 300), 0, 300)).toBeUndefined();
  });

  describe("probe limit", () => {
    const wanted = new Uint8Array(16).fill(100);
    const target = concat(wanted, new Uint8Array([1, 2, 3]));

    it("builds colliding blocks", () => {
      const hash = windowHash(wanted, 0);
      for (const block of variants(20)) {
        expect(windowHash(block, 0)).toBe(hash);
        expect(block[0]).not.toBe(100);
      }
    });

    it("finds a block that is the last entry within the limit", () => {
      const source = concat(wanted, ...variants(MAX_PROBES - 1));
      const index = buildSourceIndex(source);

      expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toEqual({
        start: 0,
        len: 16,
        literalLen: 0,
      });
    });

    it("gives up after examining MAX_PROBES chain entries", () => {
      const source = concat(wanted, ...variants(MAX_PROBES));
      const index = buildSourceIndex(source);

      expect(findMatch(index, target, windowHash(target, 0), 0, 0)).toBeUndefined();
    });
  });
});
