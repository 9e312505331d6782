export type Value = { kind: "int"; value: bigint } | { kind: "float"; value: number };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function int(value: bigint): Value {
  return { kind: "int", value };
}

export function float(value: number): Value {
  return { kind: "float", value };
}

export function inInt64Range(n: bigint): boolean {
  return n >= INT64_MIN && n <= INT64_MAX;
}

export function toFloat(v: Value): number {
  return v.kind === "int" ? Number(v.value) : v.value;
}

export function isZero(v: Value): boolean {
  return v.kind === "int" ? v.value === 0n : v.value === 0;
}

/**
 * Literal-style text used in token dumps and AST labels. Floats always keep a
 * fractional part or exponent so `3.0` never reads as the integer `3`.
 */
export function describeValue(v: Value): string {
  if (v.kind === "int") return v.value.toString();
  const s = String(v.value);
  if (Number.isFinite(v.value) && !/[.e]/.test(s)) return `${s}.0`;
  return s;
}
