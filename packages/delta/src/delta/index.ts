export {
  type ApplyDeltaOptions,
  applyDelta,
  applyDeltaCommands,
} from "./apply-delta.js";
export { createDelta, createDeltaCommands } from "./create-delta.js";
export { decodeDeltaCommands, encodeDeltaCommands } from "./delta-format.js";
export { type DeltaSummary, inspectDelta } from "./inspect-delta.js";
export { findMatch } from "./matcher.js";
export { buildSourceIndex, type SourceIndex } from "./source-index.js";
export type { DeltaCommand, DeltaMatch } from "./types.js";
