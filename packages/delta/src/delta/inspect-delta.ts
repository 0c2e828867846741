import { decodeDeltaCommands } from "./delta-format.js";

/**
 * Statistics of an encoded delta
 */
export interface DeltaSummary {
  /** Total number of commands */
  commands: number;
  insertCount: number;
  copyCount: number;
  /** Literal bytes carried by the delta */
  insertedBytes: number;
  /** Bytes taken from the source */
  copiedBytes: number;
  /** Length of the target the delta reconstructs */
  targetLength: number;
  /** End of the furthest copy range: the shortest source the delta applies to */
  requiredSourceLength: number;
}

/**
 * Summarize a delta without a source to apply it to.
 *
 * @throws DeltaFormatError if the delta is malformed
 */
export function inspectDelta(delta: Uint8Array): DeltaSummary {
  const summary: DeltaSummary = {
    commands: 0,
    insertCount: 0,
    copyCount: 0,
    insertedBytes: 0,
    copiedBytes: 0,
    targetLength: 0,
    requiredSourceLength: 0,
  };

  for (const command of decodeDeltaCommands(delta)) {
    summary.commands++;
    if (command.type === "insert") {
      summary.insertCount++;
      summary.insertedBytes += command.data.length;
    } else {
      summary.copyCount++;
      summary.copiedBytes += command.len;
      summary.requiredSourceLength = Math.max(
        summary.requiredSourceLength,
        command.start + command.len,
      );
    }
  }
  summary.targetLength = summary.insertedBytes + summary.copiedBytes;

  return summary;
}
