import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CalcError } from "../dsl/errors";
import type { Value } from "../dsl/value";
import { formatValue } from "./format";

// ============================================================================
// Event Types
// ============================================================================

const LoggedValueSchema = z.object({
  kind: z.enum(["int", "float"]),
  value: z.string(),
});

export const CalcEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("result"),
    expression: z.string(),
    result: LoggedValueSchema,
    ts: z.string(),
  }),
  z.object({
    type: z.literal("error"),
    expression: z.string(),
    error: z.string(),
    message: z.string(),
    ts: z.string(),
  }),
]);

export type CalcEvent = z.infer<typeof CalcEventSchema>;
export type LoggedValue = z.infer<typeof LoggedValueSchema>;

export function toLoggedValue(v: Value): LoggedValue {
  return { kind: v.kind, value: formatValue(v) };
}

// ============================================================================
// Calculation Logger
// ============================================================================

/** Append-only JSONL log of calculations, one event per line. */
export class CalcLogger {
  constructor(
    readonly file: string,
    private now: () => Date = () => new Date(),
  ) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
  }

  async append(ev: CalcEvent): Promise<void> {
    await fs.appendFile(this.file, JSON.stringify(ev) + "\n", "utf8");
  }

  async logResult(expression: string, value: Value): Promise<void> {
    await this.append({
      type: "result",
      expression,
      result: toLoggedValue(value),
      ts: this.now().toISOString(),
    });
  }

  async logError(expression: string, error: CalcError): Promise<void> {
    await this.append({
      type: "error",
      expression,
      error: error.kind,
      message: error.message,
      ts: this.now().toISOString(),
    });
  }
}

/** Read a log back; a missing file is an empty history. */
export async function readEvents(file: string): Promise<CalcEvent[]> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  return content
    .split("\n")
    .filter((line) => line.trim())
    .map((line, idx) => {
      const parsed = CalcEventSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Invalid log entry #${idx + 1}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
      }
      return parsed.data;
    });
}
