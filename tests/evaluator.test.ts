import { describe, expect, it } from "vitest";
import { calculate } from "../src/calculator";
import { binaryNode, numberNode } from "../src/dsl/ast";
import { evaluate } from "../src/dsl/evaluator";
import { float, int, type Value } from "../src/dsl/value";
import { catchCalcError } from "./helpers";

const run = (src: string): Value => calculate(src);
const fault = (src: string) => catchCalcError(() => calculate(src));

function floatOf(src: string): number {
  const v = run(src);
  expect(v.kind).toBe("float");
  return v.kind === "float" ? v.value : Number.NaN;
}

describe("evaluate", () => {
  describe("integer arithmetic", () => {
    it("keeps integer results for + - *", () => {
      expect(run("2 + 3")).toEqual(int(5n));
      expect(run("10 - 20")).toEqual(int(-10n));
      expect(run("2 + 3 * 4")).toEqual(int(14n));
      expect(run("(5 + 3) * 2 - 10 % 3")).toEqual(int(15n));
      expect(run("123456789 * 987654321")).toEqual(int(121932631112635269n));
    });

    it("takes a truncated remainder", () => {
      expect(run("7 % 3")).toEqual(int(1n));
      expect(run("-7 % 3")).toEqual(int(-1n));
      expect(run("0 % 5")).toEqual(int(0n));
    });

    it("faults instead of wrapping", () => {
      expect(fault("9223372036854775807 + 1").kind).toBe("Overflow");
      expect(fault("3037000500 * 3037000500").kind).toBe("Overflow");
      expect(run("-9223372036854775807 - 1")).toEqual(int(-9223372036854775808n));
      expect(fault("-(-9223372036854775807 - 1)").kind).toBe("Overflow");
    });
  });

  describe("promotion", () => {
    it("promotes mixed operands to float", () => {
      expect(run("1 + 2.5")).toEqual(float(3.5));
      expect(run("10.0 - 3")).toEqual(float(7));
      expect(run("4 * 2.5")).toEqual(float(10));
    });

    it("always divides in float", () => {
      expect(run("6 / 2")).toEqual(float(3));
      expect(run("10 / 4")).toEqual(float(2.5));
      expect(floatOf("1 / 3")).toBeCloseTo(1 / 3, 12);
    });

    it("raises to a float power", () => {
      expect(run("2 ^ 3 ^ 2")).toEqual(float(512));
      expect(run("-2 ^ 2")).toEqual(float(-4));
      expect(run("(-2) ^ 2")).toEqual(float(4));
      expect(run("2 ^ -1")).toEqual(float(0.5));
      expect(floatOf("2 ^ 0.5")).toBeCloseTo(Math.SQRT2, 12);
    });
  });

  describe("arithmetic faults", () => {
    it("rejects a zero divisor", () => {
      expect(fault("5 / 0").kind).toBe("DivisionByZero");
      expect(fault("5 / 0.0").kind).toBe("DivisionByZero");
      expect(fault("10 % 0").kind).toBe("DivisionByZero");
    });

    it("rejects modulo with any float operand", () => {
      expect(fault("10 % 2.0").kind).toBe("FloatModulo");
      expect(fault("5.5 % 2").kind).toBe("FloatModulo");
      expect(fault("10 % 0.0").kind).toBe("FloatModulo");
    });

    it("points at the faulting operator", () => {
      const err = fault("1 + 2 / 0");
      expect(err.span).toEqual({ start: 6, end: 7 });
      expect(err.category).toBe("runtime");
    });
  });

  describe("unary signs", () => {
    it("preserves the operand type", () => {
      expect(run("+5")).toEqual(int(5n));
      expect(run("--5")).toEqual(int(5n));
      expect(run("-+5")).toEqual(int(-5n));
      expect(run("-3.14")).toEqual(float(-3.14));
    });
  });

  describe("constants", () => {
    it("resolves pi and e", () => {
      expect(run("pi")).toEqual(float(Math.PI));
      expect(run("2 * e")).toEqual(float(2 * Math.E));
    });

    it("faults on any other name at evaluation time", () => {
      const err = fault("foo + 1");
      expect(err.kind).toBe("UnknownVariable");
      expect(err.span).toEqual({ start: 0, end: 3 });
      expect(err.message).toBe("unknown variable 'foo'");
    });
  });

  describe("functions", () => {
    it("keeps abs integer for an integer argument", () => {
      expect(run("abs(-5)")).toEqual(int(5n));
      expect(run("abs(-2.5)")).toEqual(float(2.5));
      expect(fault("abs(-9223372036854775807 - 1)").kind).toBe("Overflow");
    });

    it("returns floats from everything else", () => {
      expect(run("pow(2, 3)")).toEqual(float(8));
      expect(run("sqrt(16)")).toEqual(float(4));
      expect(run("sin(0)")).toEqual(float(0));
      expect(run("cos(0)")).toEqual(float(1));
      expect(floatOf("tan(pi / 4)")).toBeCloseTo(1, 12);
      expect(floatOf("log(1000)")).toBeCloseTo(3, 12);
      expect(floatOf("ln(e)")).toBeCloseTo(1, 12);
      expect(run("sqrt(4) + abs(3)")).toEqual(float(5));
    });

    it("checks domains", () => {
      expect(fault("sqrt(-1)").kind).toBe("InvalidFunctionArgument");
      expect(fault("log(0)").kind).toBe("InvalidFunctionArgument");
      expect(fault("ln(0)").kind).toBe("InvalidFunctionArgument");
      expect(fault("ln(-2.5)").kind).toBe("InvalidFunctionArgument");
    });

    it("checks arity", () => {
      const err = fault("pow(2)");
      expect(err.kind).toBe("WrongArgumentCount");
      expect(err.message).toBe("pow expects 2 arguments, got 1");
      expect(fault("sqrt(1, 2)").message).toBe("sqrt expects 1 argument, got 2");
      expect(fault("abs()").kind).toBe("WrongArgumentCount");
    });

    it("evaluates arguments before checking the count", () => {
      const unknown = fault("pow(foo)");
      expect(unknown.kind).toBe("UnknownVariable");
      expect(unknown.span).toEqual({ start: 4, end: 7 });
      expect(fault("sqrt(1 / 0, 2)").kind).toBe("DivisionByZero");
      expect(fault("abs(2, 1 % 0.5)").kind).toBe("FloatModulo");
    });
  });

  it("evaluates hand-built trees", () => {
    const span = { start: 0, end: 0 };
    const node = binaryNode("add", numberNode(int(2n), span), numberNode(float(0.5), span), span);
    expect(evaluate(node)).toEqual(float(2.5));
  });

  it("keeps no state between calls", () => {
    expect(fault("1 / 0").kind).toBe("DivisionByZero");
    expect(run("1 + 1")).toEqual(int(2n));
  });
});
