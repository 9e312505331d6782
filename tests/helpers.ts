import { CalcError } from "../src/dsl/errors";

/** Run `fn` and return the CalcError it throws. */
export function catchCalcError(fn: () => unknown): CalcError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof CalcError) return err;
    throw err;
  }
  throw new Error("expected a CalcError");
}
