export type Span = { start: number; end: number };

export type LexErrorKind = "InvalidCharacter" | "InvalidNumber";
export type ParseErrorKind = "ExpectedPrimary" | "ExpectedRParen" | "TrailingInput";
export type EvalErrorKind =
  | "DivisionByZero"
  | "FloatModulo"
  | "Overflow"
  | "InvalidFunctionArgument"
  | "WrongArgumentCount"
  | "UnknownVariable";

export type CalcErrorKind = LexErrorKind | ParseErrorKind | EvalErrorKind;
export type ErrorCategory = "lexical" | "syntax" | "runtime";

const CATEGORY: Record<CalcErrorKind, ErrorCategory> = {
  InvalidCharacter: "lexical",
  InvalidNumber: "lexical",
  ExpectedPrimary: "syntax",
  ExpectedRParen: "syntax",
  TrailingInput: "syntax",
  DivisionByZero: "runtime",
  FloatModulo: "runtime",
  Overflow: "runtime",
  InvalidFunctionArgument: "runtime",
  WrongArgumentCount: "runtime",
  UnknownVariable: "runtime",
};

export class CalcError extends Error {
  readonly category: ErrorCategory;

  constructor(
    readonly kind: CalcErrorKind,
    message: string,
    readonly span: Span,
    // token kind actually found, for syntax errors
    readonly found?: string,
  ) {
    super(message);
    this.name = "CalcError";
    this.category = CATEGORY[kind];
  }
}

export function isCalcError(err: unknown): err is CalcError {
  return err instanceof CalcError;
}
