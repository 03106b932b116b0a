#!/usr/bin/env node

/**
 * Model Config Store CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already reported its own errors (and printed help or version)
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose === true;
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
