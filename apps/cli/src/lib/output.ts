import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";
import type { CliOptions, OutputFormat } from "./options";

export type OutputRow = Record<string, string | undefined>;

export class OutputFormatter {
  constructor(private options: CliOptions) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  // Output rows in the selected format; text mode uses the given line renderer
  output(rows: OutputRow[], textFormatter: (rows: OutputRow[]) => string[]): void {
    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(rows, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(rows).trimEnd());
        break;
      case "table":
        this.printTable(rows);
        break;
      default:
        if (this.options.quiet) return;
        for (const line of textFormatter(rows)) {
          console.log(line);
        }
    }
  }

  // Print rows as a table, one column per key seen in any row
  printTable(rows: OutputRow[]): void {
    if (rows.length === 0) {
      console.log("(empty)");
      return;
    }

    const cols = [...new Set(rows.flatMap((row) => Object.keys(row)))];
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => row[c] ?? ""));
    }

    console.log(table.toString());
  }

  // Print error message
  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  // Print verbose/debug message
  debug(message: string): void {
    if (this.options.verbose) {
      console.error(chalk.gray("⋯"), chalk.gray(message));
    }
  }
}
