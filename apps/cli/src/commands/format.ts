import { byteSizeSchema, formatByteSize } from "@bytesize/core";
import type { Command } from "commander";
import { loadCliOptions } from "../lib/options";
import { OutputFormatter, type OutputRow } from "../lib/output";

/**
 * Format each value; a value may be a plain byte count or any size string
 * the parser accepts ("1536KiB").
 */
export function formatValues(values: string[]): OutputRow[] {
  return values.map((input): OutputRow => {
    const result = byteSizeSchema.safeParse(input);
    if (!result.success) {
      return { input, error: result.error.issues[0]?.message ?? "invalid byte count" };
    }
    return { input, bytes: result.data.toString(), formatted: formatByteSize(result.data) };
  });
}

export function registerFormatCommand(program: Command): void {
  program
    .command("format <values...>")
    .description("Format byte counts with three significant digits (e.g. 314000 -> 314 kB)")
    .action((values: string[]) => {
      const formatter = new OutputFormatter(loadCliOptions(program.opts()));
      const rows = formatValues(values);

      for (const row of rows) {
        if (row.error !== undefined) {
          if (formatter.format === "text") {
            formatter.error(`${row.input}: ${row.error}`);
          }
          process.exitCode = 1;
        }
      }

      formatter.output(rows, (all) =>
        all.flatMap((row) => (row.formatted === undefined ? [] : [row.formatted]))
      );
    });
}
