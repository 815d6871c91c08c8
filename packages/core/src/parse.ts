/**
 * Byte size parsing
 *
 * Format: {digits}[.{digits}][ws][prefix][i][b], case-insensitive
 * e.g., "555k", "1.5 MB", "15 EiB", "2gi", "4096", "0.001 zb"
 */

import { MAX_BYTE_COUNT } from "./constants.ts";
import { createParseError } from "./errors.ts";
import { prefixForLetter } from "./prefix-table.ts";
import type {
  ByteCount,
  ByteSizeParseError,
  ByteSizeParseResult,
  ParseOptions,
  PrefixEntry,
} from "./types.ts";

/**
 * Scanned pieces of a byte size string
 */
type Scanned = {
  integerDigits: string;
  fractionDigits: string;
  prefix: PrefixEntry | undefined;
  binary: boolean;
};

/**
 * An integer part longer than this overflows under any multiplier:
 * 20 digits for 2^64 - 1, plus 3 per magnitude up to yotta.
 */
const MAX_INTEGER_DIGITS = 45;

function overflowError(text: string): ByteSizeParseError {
  return createParseError("overflow", text, `"${text}" exceeds ${MAX_BYTE_COUNT} bytes`);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isBlank(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

function readDigits(text: string, start: number): number {
  let pos = start;
  while (isDigit(text[pos])) pos++;
  return pos;
}

/**
 * Split the input into mantissa digits and unit, in one pass.
 */
function scan(text: string): Scanned | ByteSizeParseError {
  if (text.length === 0) {
    return createParseError("empty_input", text);
  }

  const intEnd = readDigits(text, 0);
  if (intEnd === 0) {
    return createParseError("invalid_number", text);
  }
  let pos = intEnd;

  let fractionDigits = "";
  if (text[pos] === ".") {
    const fracEnd = readDigits(text, pos + 1);
    if (fracEnd === pos + 1) {
      return createParseError("invalid_number", text, "expected digits after decimal point");
    }
    fractionDigits = text.slice(pos + 1, fracEnd);
    pos = fracEnd;
  }
  if (text[pos] === ".") {
    return createParseError("invalid_number", text, "number has more than one decimal point");
  }

  while (isBlank(text[pos])) pos++;

  let prefix: PrefixEntry | undefined;
  let binary = false;
  const ch = text[pos];
  if (ch !== undefined) {
    prefix = prefixForLetter(ch);
    if (prefix) {
      pos++;
      if (text[pos] === "i" || text[pos] === "I") {
        binary = true;
        pos++;
      }
      if (text[pos] === "b" || text[pos] === "B") pos++;
    } else if (ch === "b" || ch === "B") {
      pos++;
    } else {
      return createParseError("invalid_units", text, `unknown unit prefix "${ch}"`);
    }
  }

  if (pos < text.length) {
    return createParseError(
      "trailing_input",
      text,
      `unexpected "${text.slice(pos)}" after units`
    );
  }

  return {
    integerDigits: text.slice(0, intEnd),
    fractionDigits,
    prefix,
    binary,
  };
}

/**
 * Parse a byte size string.
 *
 * The mantissa is read as an exact fraction and combined with the prefix
 * multiplier in bigint arithmetic, so the result is exact up to the final
 * rounding step and overflow is reported instead of wrapping.
 *
 * @param text - Byte size string
 * @param options - Rounding and fractional-byte handling
 * @returns Parse result with the byte count or an error
 *
 * @example
 * ```ts
 * parseByteSize("555k")     // => { ok: true, value: 555000n }
 * parseByteSize("15 EiB")   // => { ok: true, value: 17293822569102704640n }
 * parseByteSize("0.001 zb") // => { ok: true, value: 1000000000000000000n }
 * parseByteSize("1..5k")    // => { ok: false, error: { kind: "syntax", code: "invalid_number", ... } }
 * ```
 */
export function parseByteSize(text: string, options: ParseOptions = {}): ByteSizeParseResult {
  const scanned = scan(text);
  if ("code" in scanned) {
    return { ok: false, error: scanned };
  }

  const { integerDigits, fractionDigits, prefix, binary } = scanned;
  const rounding = options.rounding ?? "truncate";

  if (!prefix && /[1-9]/.test(fractionDigits) && !options.allowFractionalBytes) {
    return { ok: false, error: createParseError("fractional_bytes", text) };
  }
  if (integerDigits.replace(/^0+/, "").length > MAX_INTEGER_DIGITS) {
    return { ok: false, error: overflowError(text) };
  }

  const numerator = BigInt(integerDigits + fractionDigits);
  const denominator = 10n ** BigInt(fractionDigits.length);
  let multiplier = 1n;
  if (prefix) {
    multiplier = binary ? prefix.binaryMultiplier : prefix.decimalMultiplier;
  }

  const product = numerator * multiplier;
  let value = product / denominator;
  if (rounding === "half_even") {
    const twiceRem = (product % denominator) * 2n;
    if (twiceRem > denominator || (twiceRem === denominator && value % 2n === 1n)) {
      value += 1n;
    }
  }

  if (value > MAX_BYTE_COUNT) {
    return { ok: false, error: overflowError(text) };
  }

  return { ok: true, value };
}

/**
 * Parse a byte size string, throwing on error
 *
 * @returns Parsed byte count
 * @throws Error if parsing fails; `cause` holds the ByteSizeParseError
 */
export function parseByteSizeOrThrow(text: string, options?: ParseOptions): ByteCount {
  const result = parseByteSize(text, options);
  if (!result.ok) {
    throw new Error(`Failed to parse byte size: ${result.error.message}`, { cause: result.error });
  }
  return result.value;
}
