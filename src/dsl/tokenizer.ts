import { CalcError } from "./errors";
import { float, inInt64Range, int, type Value } from "./value";

export type OperatorKind = "add" | "sub" | "mul" | "div" | "mod" | "pow";

export type Token =
  | { kind: "number"; value: Value; start: number; end: number }
  | { kind: "identifier"; text: string; start: number; end: number }
  | { kind: OperatorKind | "lparen" | "rparen" | "comma" | "eof"; start: number; end: number };

export type TokenKind = Token["kind"];

type SimpleKind = Exclude<TokenKind, "number" | "identifier" | "eof">;

const SINGLE: Record<string, SimpleKind> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "mod",
  "^": "pow",
  "(": "lparen",
  ")": "rparen",
  ",": "comma",
};

function isSpace(c: string): boolean {
  return c === " " || c === "\t" || c === "\r" || c === "\n" || c === "\v" || c === "\f";
}

function isAlpha(c: string): boolean {
  return /[A-Za-z]/.test(c);
}

function isAlnum(c: string): boolean {
  return /[A-Za-z0-9_]/.test(c);
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

export function scan(src: string): Token[] {
  const toks: Token[] = [];
  let i = 0;

  const digitAt = (j: number): boolean => isDigit(src[j] ?? "");

  const skipDigits = (j: number): number => {
    while (digitAt(j)) j++;
    return j;
  };

  while (i < src.length) {
    const c = src[i] ?? "";

    if (isSpace(c)) {
      i++;
      continue;
    }

    const single = SINGLE[c];
    if (single) {
      toks.push({ kind: single, start: i, end: i + 1 });
      i++;
      continue;
    }

    if (isDigit(c) || c === ".") {
      const start = i;
      let j = skipDigits(i);
      let digits = j - start;
      let isFloat = false;

      if (src[j] === ".") {
        isFloat = true;
        const frac = skipDigits(j + 1);
        digits += frac - (j + 1);
        j = frac;
      }

      if (digits === 0) {
        throw new CalcError("InvalidNumber", "invalid number literal", { start, end: j });
      }

      // exponent only when a digit follows, otherwise `e` is rescanned
      const e = src[j];
      if (e === "e" || e === "E") {
        const sign = src[j + 1];
        const first = sign === "+" || sign === "-" ? j + 2 : j + 1;
        if (digitAt(first)) {
          isFloat = true;
          j = skipDigits(first);
        }
      }

      const text = src.slice(start, j);
      toks.push({ kind: "number", value: parseNumber(text, isFloat, start, j), start, end: j });
      i = j;
      continue;
    }

    if (isAlpha(c)) {
      let j = i + 1;
      while (j < src.length && isAlnum(src[j] ?? "")) j++;
      toks.push({ kind: "identifier", text: src.slice(i, j), start: i, end: j });
      i = j;
      continue;
    }

    throw new CalcError("InvalidCharacter", `unexpected character '${c}'`, { start: i, end: i + 1 });
  }

  toks.push({ kind: "eof", start: src.length, end: src.length });
  return toks;
}

function parseNumber(text: string, isFloat: boolean, start: number, end: number): Value {
  if (isFloat) {
    const n = Number(text);
    if (Number.isNaN(n)) {
      throw new CalcError("InvalidNumber", `invalid number literal '${text}'`, { start, end });
    }
    return float(n);
  }
  const n = BigInt(text);
  if (!inInt64Range(n)) {
    throw new CalcError("InvalidNumber", `integer literal '${text}' does not fit in 64 bits`, { start, end });
  }
  return int(n);
}
