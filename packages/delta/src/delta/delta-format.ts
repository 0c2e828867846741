import { DeltaCommandTag } from "../constants.js";
import { DeltaFormatError } from "../errors.js";
import { ByteReader } from "../io/byte-reader.js";
import { ByteWriter } from "../io/byte-writer.js";
import type { DeltaCommand } from "./types.js";

/**
 * Serialize delta commands to the binary wire format
 *
 * Format, repeated until the end of the delta:
 *   insert: <0x02><var-uint len><len bytes>
 *   copy:   <0x01><var-uint len><var-uint start>
 *
 * @param commands Delta commands in target order
 * @param capacityHint Expected size of the encoded delta
 * @returns Encoded delta
 */
export function encodeDeltaCommands(
  commands: Iterable<DeltaCommand>,
  capacityHint?: number,
): Uint8Array {
  const writer = new ByteWriter(capacityHint);
  for (const command of commands) {
    switch (command.type) {
      case "insert":
        writer.writeByte(DeltaCommandTag.INSERT);
        writer.writeVarUint(command.data.length);
        writer.writeBytes(command.data);
        continue;
      case "copy":
        writer.writeByte(DeltaCommandTag.COPY);
        writer.writeVarUint(command.len);
        writer.writeVarUint(command.start);
        continue;
    }
  }
  return writer.toUint8Array();
}

/**
 * Parse the binary wire format into delta commands
 *
 * Only the structure of the delta is validated here; copy ranges are
 * checked against the source when the delta is applied. Insert data are
 * views into `delta`.
 *
 * @throws DeltaFormatError on unknown commands or truncated data
 */
export function* decodeDeltaCommands(delta: Uint8Array): Generator<DeltaCommand> {
  const reader = new ByteReader(delta);
  while (reader.hasBytes()) {
    const commandOffset = reader.position;
    const tag = reader.readByte();
    switch (tag) {
      case DeltaCommandTag.COPY: {
        const len = reader.readVarUint();
        const start = reader.readVarUint();
        yield { type: "copy", start, len };
        continue;
      }
      case DeltaCommandTag.INSERT: {
        const len = reader.readVarUint();
        if (len > reader.remaining) {
          throw new DeltaFormatError(
            `insert of ${len} bytes exceeds the ${reader.remaining} remaining delta bytes`,
            reader.position,
          );
        }
        yield { type: "insert", data: reader.readBytes(len) };
        continue;
      }
      default:
        throw new DeltaFormatError(
          `unknown delta command: 0x${tag.toString(16).padStart(2, "0")}`,
          commandOffset,
        );
    }
  }
}
