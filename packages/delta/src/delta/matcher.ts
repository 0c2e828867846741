import { HASH_SIZE, MAX_PROBES } from "../constants.js";
import { varUintSize } from "../encoding/var-uint.js";
import type { SourceIndex } from "./source-index.js";
import type { DeltaMatch } from "./types.js";

/**
 * Look for the longest source region matching the target around
 * `target[base + i]`, where the window `target[base + i .. base + i + HASH_SIZE)`
 * hashes to `hashValue`.
 *
 * Each source block in the bucket chain anchors a candidate that is
 * extended forwards as far as both buffers agree, and backwards no further
 * than `base` in the target. A candidate is only taken when its length pays
 * for its encoding (the copy command plus the header of the literal run in
 * front of it) and it is strictly longer than the best one so far.
 *
 * @returns The best match, or undefined if no candidate qualifies
 */
export function findMatch(
  index: SourceIndex,
  target: Uint8Array,
  hashValue: number,
  base: number,
  i: number,
): DeltaMatch | undefined {
  const { source, blockCount, landmark, collide } = index;
  if (blockCount === 0) return undefined;

  let best: DeltaMatch | undefined;
  let limit = MAX_PROBES;
  let block = landmark[hashValue % blockCount];

  while (block >= 0 && limit-- > 0) {
    const anchor = block * HASH_SIZE;

    let forward = 0;
    for (
      let x = anchor, y = base + i;
      x < source.length && y < target.length && source[x] === target[y];
      x++, y++
    ) {
      forward++;
    }

    // Never reaches source[0] nor anything before target[base]
    let k = 1;
    while (k < anchor && k <= i && source[anchor - k] === target[base + i - k]) {
      k++;
    }
    const backward = k - 1;

    const start = anchor - backward;
    const len = forward + backward;
    const literalLen = i - backward;
    const cost = varUintSize(literalLen) + varUintSize(len) + varUintSize(start) + 3;

    if (len >= cost && len > (best?.len ?? 0)) {
      best = { start, len, literalLen };
    }

    block = collide[block];
  }

  return best;
}
