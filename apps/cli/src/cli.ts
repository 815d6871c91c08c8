#!/usr/bin/env node

import { CommanderError } from "commander";
import { createProgram } from "./program";

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help, --version and friends
      if (
        error.code === "commander.helpDisplayed" ||
        error.code === "commander.version" ||
        error.code === "commander.help"
      ) {
        process.exit(0);
      }
      // commander has already printed its own message
      process.exit(error.exitCode || 1);
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exit(1);
  }
}

void main();
