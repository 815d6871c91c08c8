import { formatByteSize, type ParseOptions, parseByteSize } from "@bytesize/core";
import type { Command } from "commander";
import { loadCliOptions, loadParseOptions } from "../lib/options";
import { OutputFormatter, type OutputRow } from "../lib/output";

export function parseInputs(inputs: string[], options: ParseOptions): OutputRow[] {
  return inputs.map((input): OutputRow => {
    const result = parseByteSize(input, options);
    if (!result.ok) {
      return { input, error: result.error.code, message: result.error.message };
    }
    return { input, bytes: result.value.toString(), formatted: formatByteSize(result.value) };
  });
}

export function registerParseCommand(program: Command): void {
  program
    .command("parse <inputs...>")
    .description("Parse sizes such as 1.5MB, 15 EiB or 2gi into exact byte counts")
    .option("--round <mode>", "sub-byte remainder handling: truncate|half_even", "truncate")
    .option("--allow-fractional-bytes", "accept fractions without a unit prefix (e.g. 1.5)")
    .action((inputs: string[], cmdOpts: Record<string, unknown>) => {
      const formatter = new OutputFormatter(loadCliOptions(program.opts()));
      const parseOptions = loadParseOptions(cmdOpts);
      formatter.debug(
        `rounding=${parseOptions.rounding} allowFractionalBytes=${parseOptions.allowFractionalBytes}`
      );

      const rows = parseInputs(inputs, parseOptions);

      for (const row of rows) {
        if (row.error !== undefined) {
          if (formatter.format === "text") {
            formatter.error(`${row.input}: ${row.message ?? row.error}`);
          }
          process.exitCode = 1;
        }
      }

      formatter.output(rows, (all) =>
        all.flatMap((row) => (row.bytes === undefined ? [] : [row.bytes]))
      );
    });
}
