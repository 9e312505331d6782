import { z } from "zod";

export const DEFAULT_MAX_INPUT_BYTES = 1024 * 1024;

export const HistoryFormatSchema = z.enum(["text", "json", "toon"]);

const CalcCommandSchema = z.object({
  command: z.literal("calc"),
  expression: z.string().min(1).optional(),
  showTokens: z.boolean(),
  showAst: z.boolean(),
  logFile: z.string().min(1).optional(),
  maxInputBytes: z.number().int().positive().max(64 * 1024 * 1024),
});

const HistoryCommandSchema = z.object({
  command: z.literal("history"),
  logFile: z.string({ required_error: "history needs --log <file> or CALC_LOG_FILE" }).min(1),
  format: HistoryFormatSchema,
  limit: z.number().int().positive().optional(),
});

const HelpCommandSchema = z.object({ command: z.literal("help") });

export const CliConfigSchema = z.discriminatedUnion("command", [
  CalcCommandSchema,
  HistoryCommandSchema,
  HelpCommandSchema,
]);

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type CalcConfig = z.infer<typeof CalcCommandSchema>;
export type HistoryConfig = z.infer<typeof HistoryCommandSchema>;
export type HistoryFormat = z.infer<typeof HistoryFormatSchema>;

const VALUE_FLAGS = new Set(["--log", "--max-input", "--format", "--limit"]);
const BOOL_FLAGS = new Set(["--tokens", "--ast", "--help", "-h"]);

/**
 * Split argv (without the node binary and script path) into flags and
 * positionals, then validate. Anything after `--` is positional.
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CliConfig {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (VALUE_FLAGS.has(arg)) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) throw new Error(`Missing value for ${arg}`);
      values.set(arg, next);
      i++;
      continue;
    }
    if (BOOL_FLAGS.has(arg)) {
      flags.add(arg);
      continue;
    }
    if (arg.startsWith("--")) throw new Error(`Unknown option: ${arg}`);
    positional.push(arg);
  }

  const hasFlag = (flag: string): boolean => flags.has(flag);
  const argValue = (flag: string): string | undefined => values.get(flag);
  const numeric = (flag: string): number | undefined => {
    const raw = argValue(flag);
    return raw === undefined ? undefined : Number(raw);
  };

  if (hasFlag("--help") || hasFlag("-h")) return CliConfigSchema.parse({ command: "help" });

  const logFile = argValue("--log") ?? (env.CALC_LOG_FILE || undefined);

  if (positional[0] === "history") {
    return CliConfigSchema.parse({
      command: "history",
      logFile,
      format: argValue("--format") ?? "text",
      limit: numeric("--limit"),
    });
  }

  return CliConfigSchema.parse({
    command: "calc",
    expression: positional.length > 0 ? positional.join(" ") : undefined,
    showTokens: hasFlag("--tokens"),
    showAst: hasFlag("--ast"),
    logFile,
    maxInputBytes: numeric("--max-input") ?? DEFAULT_MAX_INPUT_BYTES,
  });
}
