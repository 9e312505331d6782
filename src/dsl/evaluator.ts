import type { BinaryKind, Node } from "./ast";
import { CONSTANTS, FUNCTIONS } from "./builtins";
import { CalcError, type Span } from "./errors";
import { float, inInt64Range, int, isZero, toFloat, type Value } from "./value";

const checked = (n: bigint, span: Span): Value => {
  if (!inInt64Range(n)) throw new CalcError("Overflow", "integer overflow", span);
  return int(n);
};

function binary(op: BinaryKind, l: Value, r: Value, span: Span): Value {
  switch (op) {
    case "add":
    case "sub":
    case "mul": {
      if (l.kind === "int" && r.kind === "int") {
        if (op === "add") return checked(l.value + r.value, span);
        if (op === "sub") return checked(l.value - r.value, span);
        return checked(l.value * r.value, span);
      }
      const a = toFloat(l);
      const b = toFloat(r);
      if (op === "add") return float(a + b);
      if (op === "sub") return float(a - b);
      return float(a * b);
    }
    case "div":
      if (isZero(r)) throw new CalcError("DivisionByZero", "division by zero", span);
      return float(toFloat(l) / toFloat(r));
    case "mod":
      if (l.kind === "float" || r.kind === "float") {
        throw new CalcError("FloatModulo", "modulo requires integer operands", span);
      }
      if (r.value === 0n) throw new CalcError("DivisionByZero", "division by zero", span);
      // bigint `%` truncates toward zero, sign follows the dividend
      return int(l.value % r.value);
    case "pow":
      return float(Math.pow(toFloat(l), toFloat(r)));
  }
}

export function evaluate(node: Node): Value {
  switch (node.type) {
    case "Num":
      return node.value;

    case "Binary": {
      const l = evaluate(node.left);
      const r = evaluate(node.right);
      return binary(node.op, l, r, node.span);
    }

    case "Unary": {
      const v = evaluate(node.child);
      if (node.op === "pos") return v;
      return v.kind === "int" ? checked(-v.value, node.span) : float(-v.value);
    }

    case "Var": {
      const c = CONSTANTS.get(node.name);
      if (!c) throw new CalcError("UnknownVariable", `unknown variable '${node.name}'`, node.span);
      return c;
    }

    case "Call": {
      const f = FUNCTIONS.get(node.name);
      if (!f) throw new TypeError(`Invalid function: ${node.name}`);
      // arguments first, left to right; a faulting argument wins over a bad count
      const args = node.args.map((a) => evaluate(a));
      if (args.length !== f.arity) {
        throw new CalcError(
          "WrongArgumentCount",
          `${f.name} expects ${f.arity} argument${f.arity === 1 ? "" : "s"}, got ${args.length}`,
          node.span,
        );
      }
      return f.apply(args, node.span);
    }
  }
}
