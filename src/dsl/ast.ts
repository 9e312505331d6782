import { isFunctionName } from "./builtins";
import type { Span } from "./errors";
import type { OperatorKind } from "./tokenizer";
import type { Value } from "./value";

export type BinaryKind = OperatorKind;
export type UnaryKind = "pos" | "neg";

export type Node =
  | { type: "Num"; value: Value; span: Span }
  | { type: "Binary"; op: BinaryKind; left: Node; right: Node; span: Span }
  | { type: "Unary"; op: UnaryKind; child: Node; span: Span }
  | { type: "Call"; name: string; args: readonly Node[]; span: Span }
  | { type: "Var"; name: string; span: Span };

const BINARY_KINDS: ReadonlySet<string> = new Set<BinaryKind>(["add", "sub", "mul", "div", "mod", "pow"]);
const UNARY_KINDS: ReadonlySet<string> = new Set<UnaryKind>(["pos", "neg"]);

export function isBinaryKind(k: string): k is BinaryKind {
  return BINARY_KINDS.has(k);
}

export function isUnaryKind(k: string): k is UnaryKind {
  return UNARY_KINDS.has(k);
}

// -------- Constructors --------
// Tags are checked before a node exists so a tree never holds an unknown operator.

export function numberNode(value: Value, span: Span): Node {
  const node: Node = { type: "Num", value, span };
  return Object.freeze(node);
}

export function binaryNode(op: string, left: Node, right: Node, span: Span): Node {
  if (!isBinaryKind(op)) throw new TypeError(`Invalid binary operator: ${op}`);
  const node: Node = { type: "Binary", op, left, right, span };
  return Object.freeze(node);
}

export function unaryNode(op: string, child: Node, span: Span): Node {
  if (!isUnaryKind(op)) throw new TypeError(`Invalid unary operator: ${op}`);
  const node: Node = { type: "Unary", op, child, span };
  return Object.freeze(node);
}

export function callNode(name: string, args: Node[], span: Span): Node {
  if (!isFunctionName(name)) throw new TypeError(`Invalid function: ${name}`);
  const node: Node = { type: "Call", name, args: Object.freeze([...args]), span };
  return Object.freeze(node);
}

export function varNode(name: string, span: Span): Node {
  const node: Node = { type: "Var", name, span };
  return Object.freeze(node);
}
