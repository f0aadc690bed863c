/**
 * Game version errors
 *
 * Two failure kinds exist: a string that is not a version, and an ordering
 * request on operands that have no total order (short or wildcard values).
 * Both are thrown synchronously; `toFriendlyError` turns them into the
 * result shape used by the `safe*` helpers.
 */

export type VersionErrorType = "malformed" | "incomparable";

export interface FriendlyError {
  type: VersionErrorType;
  message: string;
  details?: string[];
}

export type VersionResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export abstract class GameVersionError extends Error {
  abstract readonly code: string;
}

export class MalformedVersionError extends GameVersionError {
  readonly code = "MALFORMED_VERSION";

  constructor(readonly input: string) {
    super(`${input} is not a valid game version`);
    this.name = "MalformedVersionError";
  }
}

export class IncomparableVersionsError extends GameVersionError {
  readonly code = "INCOMPARABLE_VERSIONS";

  /**
   * @param left - Rendering of the left operand
   * @param right - Rendering of the right operand
   * @param operation - Name of the operation that refused them
   */
  constructor(
    readonly left: string,
    readonly right: string,
    readonly operation: string
  ) {
    super(`${left} and ${right} cannot be compared by ${operation}`);
    this.name = "IncomparableVersionsError";
  }
}

/**
 * Map a thrown game version error to its friendly form.
 * Anything that is not a game version error is re-thrown untouched.
 */
export function toFriendlyError(err: unknown): FriendlyError {
  if (err instanceof MalformedVersionError) {
    return {
      type: "malformed",
      message: err.message,
      details: ["Expected major.minor, major.minor.patch or \"any\""],
    };
  }
  if (err instanceof IncomparableVersionsError) {
    return {
      type: "incomparable",
      message: err.message,
      details: [`Both operands of ${err.operation} must be long versions (major.minor.patch)`],
    };
  }
  throw err;
}

/**
 * Run `fn` and capture game version errors as a failed result.
 */
export function captureVersionResult<T>(fn: () => T): VersionResult<T> {
  try {
    return { success: true, data: fn() };
  } catch (err) {
    return { success: false, error: toFriendlyError(err) };
  }
}
