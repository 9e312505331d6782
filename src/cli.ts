#!/usr/bin/env tsx
import { ZodError } from "zod";
import { execute, EXIT_FAULT, EXIT_USAGE, USAGE } from "./runtime/app";
import { parseCliArgs, type CliConfig } from "./runtime/config";
import { InputTooLargeError } from "./runtime/input";

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  let config: CliConfig;
  try {
    config = parseCliArgs(process.argv.slice(2), process.env);
  } catch (error: unknown) {
    const message =
      error instanceof ZodError
        ? error.issues.map((i) => `${i.path.join(".") || "args"}: ${i.message}`).join("; ")
        : error instanceof Error
          ? error.message
          : String(error);
    console.error(`[calc] Error: ${message}`);
    console.error(USAGE);
    process.exit(EXIT_USAGE);
  }

  try {
    const code = await execute(config, {
      stdin: process.stdin,
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    });
    process.exit(code);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[calc] Error: ${message}`);
    process.exit(error instanceof InputTooLargeError ? EXIT_USAGE : EXIT_FAULT);
  }
}

await main();
