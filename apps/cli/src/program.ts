import { Command } from "commander";
import { registerFormatCommand } from "./commands/format";
import { registerParseCommand } from "./commands/parse";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("bytesize")
    .description("Convert between byte counts and human-readable sizes")
    .version(VERSION)
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  // Set before adding subcommands so they inherit it; cli.ts handles the errors
  program.exitOverride();

  registerFormatCommand(program);
  registerParseCommand(program);

  return program;
}
