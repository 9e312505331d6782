export { calculate, type CalculateOptions } from "./calculator";
export { scan, type Token, type TokenKind, type OperatorKind } from "./dsl/tokenizer";
export { parse } from "./dsl/parser";
export { evaluate } from "./dsl/evaluator";
export { locate, renderDiagnostic, type Location } from "./dsl/diagnostics";
export { formatAst, formatToken, formatTokens } from "./dsl/printer";
export { FUNCTIONS, CONSTANTS, type Builtin } from "./dsl/builtins";
export { CalcError, isCalcError } from "./dsl/errors";
export type { CalcErrorKind, ErrorCategory, Span } from "./dsl/errors";
export type { Node, BinaryKind, UnaryKind } from "./dsl/ast";
export type { Value } from "./dsl/value";
export { formatValue } from "./runtime/format";
