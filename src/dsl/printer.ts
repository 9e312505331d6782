import type { Node } from "./ast";
import type { Token } from "./tokenizer";
import { describeValue } from "./value";

export function formatToken(tok: Token): string {
  switch (tok.kind) {
    case "number":
      return `number(${describeValue(tok.value)})`;
    case "identifier":
      return `identifier(${tok.text})`;
    default:
      return tok.kind;
  }
}

export function formatTokens(toks: readonly Token[]): string[] {
  return toks.map(formatToken);
}

function label(n: Node): string {
  switch (n.type) {
    case "Num":
      return `number(${describeValue(n.value)})`;
    case "Binary":
    case "Unary":
      return n.op;
    case "Call":
      return n.name;
    case "Var":
      return `variable(${n.name})`;
  }
}

function children(n: Node): readonly Node[] {
  switch (n.type) {
    case "Binary":
      return [n.left, n.right];
    case "Unary":
      return [n.child];
    case "Call":
      return n.args;
    default:
      return [];
  }
}

/** Indented tree, one node per line, `├──` / `└──` connectors. */
export function formatAst(root: Node): string[] {
  const out: string[] = [label(root)];

  const walk = (n: Node, prefix: string): void => {
    const kids = children(n);
    kids.forEach((child, idx) => {
      const last = idx === kids.length - 1;
      out.push(`${prefix}${last ? "└── " : "├── "}${label(child)}`);
      walk(child, prefix + (last ? "    " : "│   "));
    });
  };

  walk(root, "");
  return out;
}
