import { describe, expect, it } from "vitest";
import { byteSizeSchema, createParseError, isByteSizeParseError } from "./index.ts";

describe("byteSizeSchema", () => {
  it("should parse size strings", () => {
    expect(byteSizeSchema.parse("500MB")).toBe(500000000n);
    expect(byteSizeSchema.parse("1.5 GiB")).toBe(1610612736n);
  });

  it("should pass through numbers and bigints", () => {
    expect(byteSizeSchema.parse(4096)).toBe(4096n);
    expect(byteSizeSchema.parse(4096n)).toBe(4096n);
  });

  it("should report parse errors as issues", () => {
    const result = byteSizeSchema.safeParse("12 furlongs");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('unknown unit prefix "f"');
    }
  });

  it("should reject out-of-range values", () => {
    expect(byteSizeSchema.safeParse(-1).success).toBe(false);
    expect(byteSizeSchema.safeParse(1.5).success).toBe(false);
    expect(byteSizeSchema.safeParse(1n << 64n).success).toBe(false);
    expect(byteSizeSchema.safeParse("16 EiB").success).toBe(false);
  });
});

describe("createParseError", () => {
  it("should fill in kind and default message", () => {
    expect(createParseError("overflow", "1 zb")).toEqual({
      name: "ByteSizeParseError",
      kind: "overflow",
      code: "overflow",
      message: "number is too large",
      input: "1 zb",
    });
    expect(createParseError("invalid_units", "5x", "bad").kind).toBe("syntax");
  });

  it("should be recognised by isByteSizeParseError", () => {
    expect(isByteSizeParseError(createParseError("empty_input", ""))).toBe(true);
    expect(isByteSizeParseError(new Error("nope"))).toBe(false);
    expect(isByteSizeParseError(null)).toBe(false);
  });
});
