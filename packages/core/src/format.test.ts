import { describe, expect, it } from "vitest";
import { formatByteSize, MAX_BYTE_COUNT } from "./index.ts";

describe("formatByteSize", () => {
  describe("plain bytes", () => {
    it("should format counts under 1000 without a prefix", () => {
      expect(formatByteSize(0)).toBe("0 B");
      expect(formatByteSize(5)).toBe("5 B");
      expect(formatByteSize(20)).toBe("20 B");
      expect(formatByteSize(100n)).toBe("100 B");
      expect(formatByteSize(500)).toBe("500 B");
      expect(formatByteSize(999)).toBe("999 B");
    });
  });

  describe("three significant digits", () => {
    const cases: Array<[bigint, string]> = [
      [1000n, "1.00 kB"],
      [1006n, "1.01 kB"],
      [2334n, "2.33 kB"],
      [2335n, "2.34 kB"],
      [9994n, "9.99 kB"],
      [10000n, "10.0 kB"],
      [10061n, "10.1 kB"],
      [99949n, "99.9 kB"],
      [314000n, "314 kB"],
      [999499n, "999 kB"],
      [1000000n, "1.00 MB"],
      [1000000000n, "1.00 GB"],
      [2300000000000n, "2.30 TB"],
      [9700000000000000n, "9.70 PB"],
      [18400000000000000000n, "18.4 EB"],
    ];

    for (const [input, expected] of cases) {
      it(`should format ${input} as "${expected}"`, () => {
        expect(formatByteSize(input)).toBe(expected);
      });
    }
  });

  describe("round half to even", () => {
    it("should keep an even last digit on a tie", () => {
      expect(formatByteSize(1005n)).toBe("1.00 kB");
      expect(formatByteSize(10050n)).toBe("10.0 kB");
      expect(formatByteSize(952500000n)).toBe("952 MB");
    });

    it("should round an odd last digit up on a tie", () => {
      expect(formatByteSize(1015n)).toBe("1.02 kB");
      expect(formatByteSize(2995n)).toBe("3.00 kB");
    });

    it("should round up anything past the midpoint", () => {
      expect(formatByteSize(952500001n)).toBe("953 MB");
      // 1.0050001 GB: remainder past the tie
      expect(formatByteSize(1005000100n)).toBe("1.01 GB");
    });
  });

  describe("bracket promotion", () => {
    it("should drop to one fractional digit when rounding reaches 10", () => {
      expect(formatByteSize(9995n)).toBe("10.0 kB");
    });

    it("should drop to no fractional digits when rounding reaches 100", () => {
      expect(formatByteSize(99950n)).toBe("100 kB");
    });

    it("should move to the next prefix when rounding reaches 1000", () => {
      expect(formatByteSize(999500n)).toBe("1.00 MB");
      expect(formatByteSize(999999999n)).toBe("1.00 GB");
    });
  });

  describe("limits", () => {
    it("should format the largest byte count", () => {
      expect(formatByteSize(MAX_BYTE_COUNT)).toBe("18.4 EB");
    });

    it("should use a lowercase symbol only for kilo", () => {
      expect(formatByteSize(1500n)).toBe("1.50 kB");
      expect(formatByteSize(1500000n)).toBe("1.50 MB");
    });

    it("should reject numbers outside the byte count range", () => {
      expect(() => formatByteSize(-1)).toThrow(RangeError);
      expect(() => formatByteSize(1.5)).toThrow(RangeError);
      expect(() => formatByteSize(MAX_BYTE_COUNT + 1n)).toThrow(RangeError);
    });
  });
});
