import type { Value } from "../dsl/value";

/**
 * Output form of a result: integers in plain decimal, floats in scientific
 * notation with a bare exponent (`5.12e2`, `3e0`, `-2.5e-1`).
 */
export function formatValue(v: Value): string {
  if (v.kind === "int") return v.value.toString();
  if (Number.isNaN(v.value)) return "nan";
  if (v.value === Infinity) return "inf";
  if (v.value === -Infinity) return "-inf";
  if (Object.is(v.value, -0)) return "-0e0";
  return v.value.toExponential().replace("e+", "e");
}
