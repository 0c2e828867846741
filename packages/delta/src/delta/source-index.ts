import { RollingHash } from "@bindelta/hash";
import { HASH_SIZE } from "../constants.js";

/**
 * Chained hash table over the non-overlapping HASH_SIZE blocks of a source.
 *
 * Both arrays hold block numbers (block `i` starts at `i * HASH_SIZE`),
 * -1 marks the end of a chain.
 */
export interface SourceIndex {
  source: Uint8Array;
  /** Number of full blocks in the source; also the number of buckets */
  blockCount: number;
  /** Most recently indexed block of each bucket */
  landmark: Int32Array;
  /** Previous block in the same bucket, per block */
  collide: Int32Array;
}

/**
 * Index every block-aligned window of the source.
 *
 * Blocks are pushed onto the front of their bucket chain, so a chain
 * walks blocks from the highest index down.
 */
export function buildSourceIndex(source: Uint8Array, hash = new RollingHash()): SourceIndex {
  const blockCount = Math.floor(source.length / HASH_SIZE);
  const landmark = new Int32Array(blockCount).fill(-1);
  const collide = new Int32Array(blockCount).fill(-1);

  for (let block = 0; block < blockCount; block++) {
    hash.init(source, block * HASH_SIZE);
    const bucket = hash.value() % blockCount;
    collide[block] = landmark[bucket];
    landmark[bucket] = block;
  }

  return { source, blockCount, landmark, collide };
}
