/** Reason codes for argument validation failures. */
export type ArgumentErrorReason = "missing" | "out_of_range";

/**
 * Thrown when an operator is called with an absent or unusable argument.
 * Raised at call time, before any lazy enumeration begins.
 */
export class ArgumentError extends Error {
  constructor(
    readonly paramName: string,
    readonly reason: ArgumentErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "ArgumentError";
  }
}

/**
 * Thrown when a numeric argument falls below its required lower bound
 * (or is not an integer where one is required).
 */
export class ArgumentOutOfRangeError extends ArgumentError {
  constructor(
    paramName: string,
    readonly actualValue: number,
    message: string,
  ) {
    super(paramName, "out_of_range", message);
    this.name = "ArgumentOutOfRangeError";
  }
}
