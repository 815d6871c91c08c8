/**
 * SI prefix table
 *
 * Eight magnitudes, kilo (10^3 / 2^10) through yotta (10^24 / 2^80).
 * Plain bytes are the implicit zeroth magnitude and have no entry.
 */

import { BINARY_PREFIX_NAMES, PREFIX_NAMES, PREFIX_SYMBOLS } from "./constants.ts";
import type { PrefixEntry } from "./types.ts";

export const PREFIX_TABLE: readonly PrefixEntry[] = Object.freeze(
  PREFIX_SYMBOLS.map((symbol, i) =>
    Object.freeze({
      symbol,
      letter: symbol.toLowerCase(),
      name: PREFIX_NAMES[i] ?? symbol,
      binaryName: BINARY_PREFIX_NAMES[i] ?? symbol,
      exponent: i + 1,
      decimalMultiplier: 1000n ** BigInt(i + 1),
      binaryMultiplier: 1024n ** BigInt(i + 1),
    })
  )
);

/**
 * Highest exponent in the table (yotta)
 */
export const MAX_EXPONENT = PREFIX_TABLE.length;

/**
 * Look up a prefix by its letter, ignoring case.
 *
 * @returns The entry, or undefined for anything but k/m/g/t/p/e/z/y
 */
export function prefixForLetter(letter: string): PrefixEntry | undefined {
  if (letter.length !== 1) return undefined;
  const lower = letter.toLowerCase();
  return PREFIX_TABLE.find((entry) => entry.letter === lower);
}

/**
 * Look up a prefix by its exponent (1 = kilo, ..., 8 = yotta).
 */
export function prefixForExponent(exponent: number): PrefixEntry | undefined {
  return PREFIX_TABLE[exponent - 1];
}
