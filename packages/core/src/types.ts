/**
 * Byte size type definitions
 */

/**
 * An unsigned 64-bit byte count.
 *
 * Carried as a bigint in [0, 2^64 - 1]; equality and ordering are the
 * bigint's own.
 */
export type ByteCount = bigint;

/**
 * One SI magnitude (kilo through yotta)
 */
export type PrefixEntry = {
  /** Display symbol: "k" for kilo, uppercase for the rest */
  readonly symbol: string;
  /** Lowercase letter matched by the parser */
  readonly letter: string;
  /** SI name, e.g. "kilo" */
  readonly name: string;
  /** IEC name of the binary counterpart, e.g. "kibi" */
  readonly binaryName: string;
  /** Power of 1000 (or 1024) this entry stands for, 1..8 */
  readonly exponent: number;
  /** Exactly 1000^exponent, may exceed 64 bits */
  readonly decimalMultiplier: bigint;
  /** Exactly 1024^exponent, may exceed 64 bits */
  readonly binaryMultiplier: bigint;
};

/**
 * How a quotient that is not a whole number of bytes is settled
 */
export type RoundingMode = "truncate" | "half_even";

export type ParseOptions = {
  /** Default: "truncate" */
  rounding?: RoundingMode;
  /**
   * Accept a nonzero fraction when no prefix is given, e.g. "1.5".
   * Default: false
   */
  allowFractionalBytes?: boolean;
};

export type ByteSizeParseErrorKind = "syntax" | "overflow";

export type ByteSizeParseErrorCode =
  | "empty_input"
  | "invalid_number"
  | "invalid_units"
  | "trailing_input"
  | "fractional_bytes"
  | "overflow";

/**
 * Byte size parse error
 */
export type ByteSizeParseError = {
  readonly name: "ByteSizeParseError";
  readonly kind: ByteSizeParseErrorKind;
  readonly code: ByteSizeParseErrorCode;
  readonly message: string;
  /** The text that failed to parse */
  readonly input: string;
};

/**
 * Byte size parse result
 */
export type ByteSizeParseResult =
  | { ok: true; value: ByteCount }
  | { ok: false; error: ByteSizeParseError };
