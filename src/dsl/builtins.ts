import { CalcError, type Span } from "./errors";
import { float, inInt64Range, int, toFloat, type Value } from "./value";

export type Builtin = {
  name: string;
  arity: number;
  apply: (args: readonly Value[], span: Span) => Value;
};

const domainError = (name: string, x: number, span: Span): CalcError =>
  new CalcError("InvalidFunctionArgument", `${name}: argument ${x} is outside the domain`, span);

// Float-only helper: promote the single argument, then apply `fn`.
function unary(name: string, fn: (x: number) => number, domain?: (x: number) => boolean): Builtin {
  return {
    name,
    arity: 1,
    apply(args, span) {
      const x = toFloat(args[0] ?? float(Number.NaN));
      if (domain && !domain(x)) throw domainError(name, x, span);
      return float(fn(x));
    },
  };
}

const abs: Builtin = {
  name: "abs",
  arity: 1,
  apply(args, span) {
    const a = args[0] ?? float(Number.NaN);
    if (a.kind === "float") return float(Math.abs(a.value));
    const r = a.value < 0n ? -a.value : a.value;
    if (!inInt64Range(r)) throw new CalcError("Overflow", "integer overflow in abs", span);
    return int(r);
  },
};

const pow: Builtin = {
  name: "pow",
  arity: 2,
  apply(args) {
    const [base, exp] = args;
    return float(Math.pow(toFloat(base ?? float(Number.NaN)), toFloat(exp ?? float(Number.NaN))));
  },
};

export const FUNCTIONS: ReadonlyMap<string, Builtin> = new Map(
  [
    abs,
    unary("sqrt", Math.sqrt, (x) => x >= 0),
    pow,
    unary("sin", Math.sin),
    unary("cos", Math.cos),
    unary("tan", Math.tan),
    unary("log", Math.log10, (x) => x > 0),
    unary("ln", Math.log, (x) => x > 0),
  ].map((b) => [b.name, b] as const),
);

export const CONSTANTS: ReadonlyMap<string, Value> = new Map([
  ["pi", float(Math.PI)],
  ["e", float(Math.E)],
]);

export function isFunctionName(name: string): boolean {
  return FUNCTIONS.has(name);
}
