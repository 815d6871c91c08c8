/**
 * @bytesize/core
 *
 * Human-readable byte sizes.
 *
 * - Formatting with three significant digits and SI prefixes (formatByteSize)
 * - Exact parsing of decimal and binary prefixed sizes (parseByteSize)
 * - Zod schema for sizes in configuration (byteSizeSchema)
 *
 * All functions are pure; the prefix table is frozen.
 */

export { isByteCount, toByteCount } from "./byte-count.ts";
export { MAX_BYTE_COUNT } from "./constants.ts";
export { createParseError, isByteSizeParseError } from "./errors.ts";
export { formatByteSize, formatByteSize as format } from "./format.ts";
export { parseByteSize, parseByteSize as parse, parseByteSizeOrThrow } from "./parse.ts";
export { PREFIX_TABLE, prefixForExponent, prefixForLetter } from "./prefix-table.ts";
export { type ByteSizeInput, byteSizeSchema } from "./schema.ts";
export type {
  ByteCount,
  ByteSizeParseError,
  ByteSizeParseErrorCode,
  ByteSizeParseErrorKind,
  ByteSizeParseResult,
  ParseOptions,
  PrefixEntry,
  RoundingMode,
} from "./types.ts";
