import { describe, expect, it } from "vitest";
import { float, int } from "../src/dsl/value";
import { formatValue } from "../src/runtime/format";

describe("formatValue", () => {
  it("prints integers in plain decimal", () => {
    expect(formatValue(int(42n))).toBe("42");
    expect(formatValue(int(-9223372036854775808n))).toBe("-9223372036854775808");
  });

  it("prints floats in scientific notation", () => {
    expect(formatValue(float(512))).toBe("5.12e2");
    expect(formatValue(float(-4))).toBe("-4e0");
    expect(formatValue(float(0.00125))).toBe("1.25e-3");
    expect(formatValue(float(1 / 3))).toBe("3.333333333333333e-1");
  });

  it("names non-finite floats", () => {
    expect(formatValue(float(Number.NaN))).toBe("nan");
    expect(formatValue(float(Infinity))).toBe("inf");
    expect(formatValue(float(-Infinity))).toBe("-inf");
  });

  it("keeps the sign of negative zero", () => {
    expect(formatValue(float(-0))).toBe("-0e0");
    expect(formatValue(float(0))).toBe("0e0");
  });
});
