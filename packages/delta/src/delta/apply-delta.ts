import { DeltaBoundsError, DeltaFormatError } from "../errors.js";
import { ByteWriter } from "../io/byte-writer.js";
import { decodeDeltaCommands } from "./delta-format.js";
import type { DeltaCommand } from "./types.js";

export interface ApplyDeltaOptions {
  /** Fail once the reconstructed target would grow past this many bytes */
  maxTargetLength?: number;
}

function isByteCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Append the output of one command, returning the new running total.
 */
function applyCommand(
  source: Uint8Array,
  command: DeltaCommand,
  writer: ByteWriter,
  total: number,
  maxTargetLength: number,
): number {
  const len = command.type === "copy" ? command.len : command.data.length;
  if (total + len > maxTargetLength) {
    throw new DeltaFormatError(`delta output exceeds the limit of ${maxTargetLength} bytes`);
  }

  if (command.type === "copy") {
    if (
      !isByteCount(command.start) ||
      !isByteCount(command.len) ||
      command.start + command.len > source.length
    ) {
      throw new DeltaBoundsError(command.start, command.len, source.length);
    }
    writer.writeBytes(source, command.start, command.len);
  } else {
    writer.writeBytes(command.data);
  }
  return total + len;
}

/**
 * Replay delta commands against a source buffer
 *
 * Either the whole target is returned or an error is thrown; partial
 * output is never exposed.
 *
 * @param source The source/base data
 * @param commands Delta commands
 * @returns The reconstructed target
 * @throws DeltaBoundsError if a copy is not a whole, non-negative range within the source
 * @throws DeltaFormatError if the output grows past `maxTargetLength`
 */
export function applyDeltaCommands(
  source: Uint8Array,
  commands: Iterable<DeltaCommand>,
  options: ApplyDeltaOptions = {},
): Uint8Array {
  const maxTargetLength = options.maxTargetLength ?? Number.POSITIVE_INFINITY;
  const writer = new ByteWriter();
  let total = 0;
  for (const command of commands) {
    total = applyCommand(source, command, writer, total, maxTargetLength);
  }
  return writer.toUint8Array();
}

/**
 * Apply a binary delta to a source buffer
 *
 * @param source The source/base data
 * @param delta Delta produced by `createDelta`
 * @returns The reconstructed target
 * @throws DeltaFormatError on unknown commands, truncated commands, or an
 *   insert longer than the rest of the delta
 * @throws DeltaBoundsError if a copy is not a whole, non-negative range within the source
 */
export function applyDelta(
  source: Uint8Array,
  delta: Uint8Array,
  options?: ApplyDeltaOptions,
): Uint8Array {
  return applyDeltaCommands(source, decodeDeltaCommands(delta), options);
}
