import { binaryNode, callNode, numberNode, unaryNode, varNode, type Node } from "./ast";
import { isFunctionName } from "./builtins";
import { CalcError, type ParseErrorKind, type Span } from "./errors";
import type { Token, TokenKind } from "./tokenizer";

const spanOf = (tok: Token): Span => ({ start: tok.start, end: tok.end });

export function parse(toks: readonly Token[]): Node {
  let i = 0;

  const peek = (): Token => {
    const tok = toks[i] ?? toks[toks.length - 1];
    if (!tok) throw new Error("Parse error: empty token stream");
    return tok;
  };

  const at = (kind: TokenKind): boolean => peek().kind === kind;

  // never moves past the eof marker
  const advance = (): Token => {
    const tok = peek();
    if (i < toks.length - 1) i++;
    return tok;
  };

  const fail = (kind: ParseErrorKind, message: string, tok: Token): CalcError =>
    new CalcError(kind, `${message}, found ${tok.kind}`, spanOf(tok), tok.kind);

  const expectRParen = (): void => {
    if (!at("rparen")) throw fail("ExpectedRParen", "expected ')'", peek());
    advance();
  };

  // -------- Expressions (precedence, low to high) --------

  const parseAddSub = (): Node => {
    let left = parseMulDiv();
    while (at("add") || at("sub")) {
      const op = advance();
      const right = parseMulDiv();
      left = binaryNode(op.kind, left, right, spanOf(op));
    }
    return left;
  };

  const parseMulDiv = (): Node => {
    let left = parsePrefix();
    while (at("mul") || at("div") || at("mod")) {
      const op = advance();
      const right = parsePrefix();
      left = binaryNode(op.kind, left, right, spanOf(op));
    }
    return left;
  };

  // Signs bind weaker than `^`: -2 ^ 2 is -(2 ^ 2).
  const parsePrefix = (): Node => {
    if (at("add") || at("sub")) {
      const sign = advance();
      const child = parsePrefix();
      return unaryNode(sign.kind === "add" ? "pos" : "neg", child, spanOf(sign));
    }
    return parsePower();
  };

  // Right-associative: the exponent re-enters Prefix.
  const parsePower = (): Node => {
    const base = parsePrimary();
    if (!at("pow")) return base;
    const op = advance();
    const exponent = parsePrefix();
    return binaryNode(op.kind, base, exponent, spanOf(op));
  };

  const parseArgs = (): Node[] => {
    const args: Node[] = [];
    if (!at("rparen")) {
      args.push(parseAddSub());
      while (at("comma")) {
        advance();
        args.push(parseAddSub());
      }
    }
    expectRParen();
    return args;
  };

  const parsePrimary = (): Node => {
    const p = peek();

    if (p.kind === "number") {
      advance();
      return numberNode(p.value, spanOf(p));
    }

    if (p.kind === "lparen") {
      advance();
      const e = parseAddSub();
      expectRParen();
      return e;
    }

    // call or var
    if (p.kind === "identifier") {
      const next = toks[i + 1];
      if (next?.kind === "lparen") {
        if (!isFunctionName(p.text)) throw fail("ExpectedPrimary", `unknown function '${p.text}'`, p);
        advance();
        advance();
        const args = parseArgs();
        return callNode(p.text, args, spanOf(p));
      }
      advance();
      return varNode(p.text, spanOf(p));
    }

    throw fail("ExpectedPrimary", "expected a number, '(' or a name", p);
  };

  const root = parseAddSub();
  if (!at("eof")) throw fail("TrailingInput", "unexpected input after expression", peek());
  return root;
}
