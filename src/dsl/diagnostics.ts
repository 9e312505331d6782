import type { CalcError } from "./errors";

export type Location = { line: number; column: number; lineText: string };

/** 1-based line/column of `offset`, plus the text of the enclosing line. */
export function locate(source: string, offset: number): Location {
  const pos = Math.max(0, Math.min(offset, source.length));

  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < pos; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }

  let lineEnd = source.indexOf("\n", lineStart);
  if (lineEnd === -1) lineEnd = source.length;
  let lineText = source.slice(lineStart, lineEnd);
  if (lineText.endsWith("\r")) lineText = lineText.slice(0, -1);

  return { line, column: pos - lineStart + 1, lineText };
}

export function renderDiagnostic(source: string, err: CalcError): string {
  const { line, column, lineText } = locate(source, err.span.start);
  const lineRest = lineText.length - (column - 1);
  const width = Math.max(1, Math.min(err.span.end - err.span.start, lineRest));
  return [
    `${err.kind}: ${err.message} (line ${line}, column ${column})`,
    lineText,
    `${" ".repeat(column - 1)}${"^".repeat(width)}`,
  ].join("\n");
}
