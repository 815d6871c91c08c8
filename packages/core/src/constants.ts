/**
 * Byte size constants
 */

/**
 * Largest representable byte count, 2^64 - 1
 */
export const MAX_BYTE_COUNT = (1n << 64n) - 1n;

/**
 * Unit letter for plain bytes, also the trailing marker after a prefix
 */
export const BYTE_UNIT = "B";

/**
 * Prefix symbols in magnitude order; kilo is the only lowercase one
 */
export const PREFIX_SYMBOLS = ["k", "M", "G", "T", "P", "E", "Z", "Y"] as const;

export const PREFIX_NAMES = ["kilo", "mega", "giga", "tera", "peta", "exa", "zetta", "yotta"] as const;

export const BINARY_PREFIX_NAMES = [
  "kibi",
  "mebi",
  "gibi",
  "tebi",
  "pebi",
  "exbi",
  "zebi",
  "yobi",
] as const;
