import type { HistoryFormat } from "./config";
import type { CalcEvent } from "./logger";
import { serialize } from "./serializer";

export type HistoryRow = {
  ts: string;
  expression: string;
  outcome: "ok" | "error";
  detail: string;
};

export function toRow(ev: CalcEvent): HistoryRow {
  if (ev.type === "result") {
    return { ts: ev.ts, expression: ev.expression, outcome: "ok", detail: ev.result.value };
  }
  return { ts: ev.ts, expression: ev.expression, outcome: "error", detail: `${ev.error}: ${ev.message}` };
}

/** Render the most recent `limit` events (all when omitted). */
export function renderHistory(events: readonly CalcEvent[], format: HistoryFormat, limit?: number): string {
  const recent = limit === undefined ? events : events.slice(-limit);

  switch (format) {
    case "json":
      return serialize(recent, { format: "json", pretty: true });
    case "toon":
      return serialize({ calculations: recent.map(toRow) }, { format: "toon" });
    case "text":
      if (recent.length === 0) return "(no calculations logged)";
      return recent
        .map((ev) => {
          const row = toRow(ev);
          return row.outcome === "ok"
            ? `[${row.ts}] ${row.expression} = ${row.detail}`
            : `[${row.ts}] ${row.expression} -> ${row.detail}`;
        })
        .join("\n");
  }
}
