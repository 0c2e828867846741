import { RollingHash } from "@bindelta/hash";
import { HASH_SIZE } from "../constants.js";
import { encodeDeltaCommands } from "./delta-format.js";
import { findMatch } from "./matcher.js";
import { buildSourceIndex } from "./source-index.js";
import type { DeltaCommand } from "./types.js";

function insert(target: Uint8Array, start: number, end: number): DeltaCommand {
  return { type: "insert", data: target.subarray(start, end) };
}

/**
 * Generate the commands transforming `source` into `target`.
 *
 * The target is scanned greedily: at every position the rolling hash of
 * the next HASH_SIZE bytes selects candidate source blocks, and the first
 * acceptable match ends the current literal run. Insert commands hold views
 * into `target`.
 *
 * @param source - The source byte array
 * @param target - The target byte array
 * @returns A generator that yields delta commands
 */
export function* createDeltaCommands(
  source: Uint8Array,
  target: Uint8Array,
): Generator<DeltaCommand> {
  // No full block can ever match: the whole target is one literal
  if (source.length <= HASH_SIZE) {
    yield insert(target, 0, target.length);
    return;
  }

  const hash = new RollingHash();
  const index = buildSourceIndex(source, hash);

  let base = 0;
  while (base + HASH_SIZE < target.length) {
    hash.init(target, base);
    let i = 0;
    while (true) {
      const match = findMatch(index, target, hash.value(), base, i);
      if (match) {
        if (match.literalLen > 0) {
          yield insert(target, base, base + match.literalLen);
          base += match.literalLen;
        }
        base += match.len;
        yield { type: "copy", start: match.start, len: match.len };
        break;
      }

      // Window reached the end of the target without a match
      if (base + i + HASH_SIZE >= target.length) {
        yield insert(target, base, target.length);
        base = target.length;
        break;
      }

      hash.next(target[base + i + HASH_SIZE]);
      i++;
    }
  }

  // Tail shorter than a window
  if (base < target.length) {
    yield insert(target, base, target.length);
  }
}

/**
 * Compute the delta transforming `source` into `target`.
 *
 * Never fails: any two buffers, empty ones included, give a valid delta.
 */
export function createDelta(source: Uint8Array, target: Uint8Array): Uint8Array {
  return encodeDeltaCommands(createDeltaCommands(source, target), target.length + HASH_SIZE);
}
