/**
 * Delta codec error classes.
 */

/**
 * Base error for all delta operations.
 */
export class DeltaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeltaError";
  }
}

/**
 * Malformed delta stream: unknown command, truncated command or integer,
 * insert longer than the remaining delta, or output above the allowed size.
 */
export class DeltaFormatError extends DeltaError {
  /** Position in the delta at which the problem was detected */
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at delta offset ${offset})`);
    this.name = "DeltaFormatError";
    this.offset = offset;
  }
}

/**
 * Copy command reaching past the end of the source buffer.
 */
export class DeltaBoundsError extends DeltaError {
  readonly start: number;
  readonly len: number;
  readonly sourceLength: number;

  constructor(start: number, len: number, sourceLength: number) {
    super(`copy [${start}, ${start + len}) extends past end of source (${sourceLength} bytes)`);
    this.name = "DeltaBoundsError";
    this.start = start;
    this.len = len;
    this.sourceLength = sourceLength;
  }
}
