/**
 * One command of a delta. Replaying the commands of a delta in order
 * against the source reproduces the target.
 */
export type DeltaCommand =
  | {
      type: "insert";
      /** Literal target bytes */
      data: Uint8Array;
    }
  | {
      type: "copy";
      /** Offset of the copied range in the source */
      start: number;
      len: number;
    };

/**
 * Best source match found for a target position
 */
export interface DeltaMatch {
  /** Offset of the match in the source */
  start: number;
  /** Length of the match */
  len: number;
  /** Number of target bytes between the scan base and the match */
  literalLen: number;
}
