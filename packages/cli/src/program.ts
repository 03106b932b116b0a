/**
 * Command definitions for the modelstore CLI
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createInterface } from "node:readline/promises";
import { logger, type Operation } from "@modelstore/sdk";
import { openCliStore, type CliStore } from "./lib/store.js";
import {
  isDiagnosticsEnabled,
  resolveStoreLocation,
  type GlobalOptions,
} from "./lib/options.js";
import { parseIndexName, parseIndexPattern } from "./lib/arg.js";
import { readModelConfigSource, type InputStream, type PutSource } from "./lib/input.js";
import { errorText, formatModelConfig, formatOperationMetrics } from "./lib/output.js";
import { CliError } from "./lib/errors.js";

interface GetOptions {
  raw?: boolean;
}

interface RmOptions {
  force?: boolean;
}

export interface ProgramIO {
  stdin: InputStream;
  /** Receives command output, one line per call */
  out: (line: string) => void;
  /** Receives diagnostics */
  err: (text: string) => void;
}

const defaultIO: ProgramIO = {
  stdin: process.stdin,
  out: (line) => console.log(line),
  err: (text) => process.stderr.write(text),
};

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));

  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the CLI program. Errors are thrown from parseAsync rather than exiting; usage
 * errors are reported by commander itself, everything else is left to the caller.
 */
export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const openStore = (): CliStore => {
    const { root, overrides } = resolveStoreLocation(globals());
    return openCliStore(root, overrides);
  };

  // Report the SDK's counters for the operation whether or not it succeeded
  const run = async (op: Operation, fn: () => Promise<void>): Promise<void> => {
    try {
      await fn();
    } finally {
      if (isDiagnosticsEnabled(globals())) {
        const line = formatOperationMetrics(op);
        if (line !== undefined) io.err(line + "\n");
      }
    }
  };

  program
    .configureOutput({
      writeErr: (str) => io.err(errorText(str)),
    })
    .exitOverride();

  // Global options
  program
    .name("modelstore")
    .description("Model Config Store - create-only storage of versioned model configs")
    .version(readVersion())
    .option("--root <path>", "Data directory root")
    .option("--write-index <name>", "Index new model configs are written to", parseIndexName)
    .option("--index-pattern <pattern>", "Index pattern reads and deletes span", parseIndexPattern)
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  // SDK logs only surface with diagnostics on
  program.hook("preAction", () => {
    logger.setEnabled(isDiagnosticsEnabled(globals()));
  });

  program
    .command("put")
    .description("Store a new model config (never overwrites)")
    .option("--file <path>", "Read model config from JSON file")
    .option("--data <json>", "Inline JSON model config")
    .action(async (options: PutSource) => {
      const doc = await readModelConfigSource(options, io.stdin);
      const store = openStore();

      await run("store", async () => {
        const config = await store.put(doc);
        if (!globals().quiet) {
          io.out(`Stored ${config.modelId} in ${store.config.writeIndex}`);
        }
      });
    });

  program
    .command("get <modelId>")
    .description("Print the latest stored version of a model config")
    .option("--raw", "Output compact JSON")
    .action(async (modelId: string, options: GetOptions) => {
      const store = openStore();

      await run("get", async () => {
        io.out(formatModelConfig(await store.get(modelId), options.raw));
      });
    });

  program
    .command("rm <modelId>")
    .description("Remove every stored version of a model config")
    .option("--force", "Force removal without confirmation")
    .action(async (modelId: string, options: RmOptions) => {
      if (!options.force) {
        if (io.stdin.isTTY !== true) {
          throw new CliError("Use --force to confirm removal in non-interactive mode");
        }

        const rl = createInterface({ input: process.stdin, output: process.stderr });
        try {
          const answer = (await rl.question(`Remove ${modelId}? (y/N) `)).trim().toLowerCase();
          if (answer !== "y") {
            throw new CliError("Aborted by user", { exitCode: 1 });
          }
        } finally {
          rl.close();
        }
      }

      const store = openStore();

      await run("delete", async () => {
        await store.remove(modelId);
        if (!globals().quiet) {
          io.out(`Removed ${modelId}`);
        }
      });
    });

  return program;
}
