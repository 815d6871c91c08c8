/**
 * ByteCount construction and checks
 */

import { MAX_BYTE_COUNT } from "./constants.ts";
import type { ByteCount } from "./types.ts";

/**
 * Check that a value is a bigint in [0, 2^64 - 1].
 */
export function isByteCount(value: unknown): value is ByteCount {
  return typeof value === "bigint" && value >= 0n && value <= MAX_BYTE_COUNT;
}

/**
 * Convert a bigint or integral number to a ByteCount.
 *
 * @throws RangeError if the value is negative, too large, or not an integer
 *
 * @example toByteCount(1024) → 1024n
 * @example toByteCount(-1) → RangeError
 */
export function toByteCount(value: bigint | number): ByteCount {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw new RangeError(`Byte count must be an integer, got ${value}`);
    }
    value = BigInt(value);
  }
  if (value < 0n) {
    throw new RangeError(`Byte count cannot be negative, got ${value}`);
  }
  if (value > MAX_BYTE_COUNT) {
    throw new RangeError(`Byte count exceeds ${MAX_BYTE_COUNT}, got ${value}`);
  }
  return value;
}
