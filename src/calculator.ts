import { evaluate } from "./dsl/evaluator";
import { parse } from "./dsl/parser";
import { formatAst, formatTokens } from "./dsl/printer";
import { scan } from "./dsl/tokenizer";
import type { Value } from "./dsl/value";

export interface CalculateOptions {
  showTokens?: boolean;
  showAst?: boolean;
  /** Sink for the token / AST dumps. Defaults to stderr. */
  trace?: (line: string) => void;
}

export function calculate(expression: string, options: CalculateOptions = {}): Value {
  const trace = options.trace ?? ((line: string) => console.error(line));

  const toks = scan(expression);
  if (options.showTokens) formatTokens(toks).forEach((line) => trace(line));

  const ast = parse(toks);
  if (options.showAst) formatAst(ast).forEach((line) => trace(line));

  return evaluate(ast);
}
