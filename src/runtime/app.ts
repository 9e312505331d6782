import { calculate } from "../calculator";
import { renderDiagnostic } from "../dsl/diagnostics";
import { isCalcError } from "../dsl/errors";
import type { CalcConfig, CliConfig, HistoryConfig } from "./config";
import { formatValue } from "./format";
import { renderHistory } from "./history";
import { readInput } from "./input";
import { CalcLogger, readEvents } from "./logger";

export const EXIT_OK = 0;
export const EXIT_FAULT = 1;
export const EXIT_USAGE = 2;

export interface AppIO {
  stdin: AsyncIterable<Buffer | string>;
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = `
Usage:
  calc [options] <expression>          Evaluate an expression
  calc [options] < file                Evaluate an expression read from STDIN
  calc history [--format <fmt>]        Show logged calculations

Options:
  --tokens              Print the token sequence (stderr)
  --ast                 Print the syntax tree (stderr)
  --log <file>          Append each calculation to a JSONL log
  --max-input <bytes>   Maximum STDIN size (default: 1048576)
  --format <fmt>        History format: text, json, toon (default: text)
  --limit <n>           Show only the last n history entries
  -h, --help            Show this help

Environment Variables:
  CALC_LOG_FILE         Default for --log

Examples:
  calc "2 ^ 3 ^ 2"
  calc --ast "sqrt(2) * -pi"
  echo "1 + (2 * 3)" | calc --tokens
  calc history --log calc.jsonl --format toon
`;

async function runCalc(config: CalcConfig, io: AppIO): Promise<number> {
  const expression = config.expression ?? (await readInput(io.stdin, config.maxInputBytes));
  if (expression.trim().length === 0) {
    io.err("[calc] Error: empty expression");
    return EXIT_USAGE;
  }

  const logger = config.logFile ? new CalcLogger(config.logFile) : null;
  if (logger) await logger.init();

  try {
    const value = calculate(expression, {
      showTokens: config.showTokens,
      showAst: config.showAst,
      trace: io.err,
    });
    if (logger) await logger.logResult(expression, value);
    io.out(formatValue(value));
    return EXIT_OK;
  } catch (error: unknown) {
    if (!isCalcError(error)) throw error;
    if (logger) await logger.logError(expression, error);
    io.err(renderDiagnostic(expression, error));
    return EXIT_FAULT;
  }
}

async function runHistory(config: HistoryConfig, io: AppIO): Promise<number> {
  const events = await readEvents(config.logFile);
  io.out(renderHistory(events, config.format, config.limit));
  return EXIT_OK;
}

/** Execute one CLI invocation; returns the process exit code. */
export async function execute(config: CliConfig, io: AppIO): Promise<number> {
  switch (config.command) {
    case "help":
      io.out(USAGE);
      return EXIT_OK;
    case "history":
      return runHistory(config, io);
    case "calc":
      return runCalc(config, io);
  }
}
