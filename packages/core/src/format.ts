/**
 * Byte size formatting
 *
 * Three significant digits with a decimal SI prefix, e.g. "1.00 kB",
 * "10.0 kB", "314 kB". Counts under 1000 are shown as plain bytes.
 */

import { toByteCount } from "./byte-count.ts";
import { BYTE_UNIT } from "./constants.ts";
import { MAX_EXPONENT, prefixForExponent } from "./prefix-table.ts";
import type { ByteCount, PrefixEntry } from "./types.ts";

type Rounded = {
  /** Mantissa scaled by 10^digits */
  scaled: bigint;
  digits: number;
};

/**
 * Fractional digits that keep three significant digits for a mantissa
 * whose integer part is `units`.
 */
function precisionFor(units: bigint): number {
  if (units < 10n) return 2;
  if (units < 100n) return 1;
  return 0;
}

/**
 * Round value / divisor to `digits` fractional digits, half to even.
 */
function roundHalfEven(value: bigint, divisor: bigint, digits: number): Rounded {
  const scale = 10n ** BigInt(digits);
  const numerator = value * scale;
  let scaled = numerator / divisor;
  const twiceRem = (numerator % divisor) * 2n;
  if (twiceRem > divisor || (twiceRem === divisor && scaled % 2n === 1n)) {
    scaled += 1n;
  }
  return { scaled, digits };
}

function integerPart({ scaled, digits }: Rounded): bigint {
  return scaled / 10n ** BigInt(digits);
}

/**
 * Largest prefix whose multiplier does not exceed the value (clamped to yotta).
 */
function selectPrefix(value: bigint): PrefixEntry {
  let exponent = 1;
  while (exponent < MAX_EXPONENT) {
    const next = prefixForExponent(exponent + 1);
    if (!next || next.decimalMultiplier > value) break;
    exponent++;
  }
  const entry = prefixForExponent(exponent);
  if (!entry) {
    throw new Error(`No prefix for exponent ${exponent}`);
  }
  return entry;
}

function render({ scaled, digits }: Rounded, prefix: PrefixEntry): string {
  const unit = `${prefix.symbol}${BYTE_UNIT}`;
  if (digits === 0) return `${scaled} ${unit}`;
  const scale = 10n ** BigInt(digits);
  const frac = (scaled % scale).toString().padStart(digits, "0");
  return `${scaled / scale}.${frac} ${unit}`;
}

/**
 * Format a byte count with three significant digits and an SI prefix.
 *
 * Never fails for a valid ByteCount. A `number` argument is range-checked
 * first and throws RangeError when it is not a valid byte count.
 *
 * @example formatByteSize(0) → "0 B"
 * @example formatByteSize(1005) → "1.00 kB"
 * @example formatByteSize(9995) → "10.0 kB"
 * @example formatByteSize(999500) → "1.00 MB"
 * @example formatByteSize(18446744073709551615n) → "18.4 EB"
 */
export function formatByteSize(value: ByteCount | number): string {
  const bytes = toByteCount(value);
  if (bytes < 1000n) {
    return `${bytes} ${BYTE_UNIT}`;
  }

  let prefix = selectPrefix(bytes);
  const divisor = prefix.decimalMultiplier;
  let rounded = roundHalfEven(bytes, divisor, precisionFor(bytes / divisor));

  // Rounding may carry into the next digit bracket; at most one promotion.
  const units = integerPart(rounded);
  if (units >= 1000n && prefix.exponent < MAX_EXPONENT) {
    const next = prefixForExponent(prefix.exponent + 1);
    if (next) {
      prefix = next;
      rounded = roundHalfEven(bytes, next.decimalMultiplier, precisionFor(bytes / next.decimalMultiplier));
    }
  } else {
    const digits = precisionFor(units);
    if (digits !== rounded.digits) {
      rounded = roundHalfEven(bytes, divisor, digits);
    }
  }

  return render(rounded, prefix);
}
