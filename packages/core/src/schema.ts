/**
 * Zod schema for byte size values in configuration
 */

import { z } from "zod";
import { isByteCount } from "./byte-count.ts";
import { MAX_BYTE_COUNT } from "./constants.ts";
import { parseByteSize } from "./parse.ts";
import type { ByteCount } from "./types.ts";

/**
 * Accepts a bigint, a non-negative safe integer, or a byte size string
 * such as "500MB" or "1.5 GiB", and outputs a ByteCount.
 */
export const byteSizeSchema = z
  .union([z.bigint(), z.number().int().nonnegative().safe(), z.string()])
  .transform((input, ctx): ByteCount => {
    if (typeof input === "string") {
      const result = parseByteSize(input);
      if (!result.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
        return z.NEVER;
      }
      return result.value;
    }
    const value = BigInt(input);
    if (!isByteCount(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `byte count must be between 0 and ${MAX_BYTE_COUNT}`,
      });
      return z.NEVER;
    }
    return value;
  });

export type ByteSizeInput = z.input<typeof byteSizeSchema>;
