import { ROLLING_WINDOW_SIZE } from "@bindelta/hash";

/** Size of the indexed source blocks, equal to the rolling hash window */
export const HASH_SIZE = ROLLING_WINDOW_SIZE;

/** Maximum number of hash chain entries examined per target position */
export const MAX_PROBES = 250;

/**
 * Command tags of the delta wire format
 */
export const DeltaCommandTag = {
  COPY: 0x01,
  INSERT: 0x02,
} as const;
