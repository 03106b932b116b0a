/**
 * Where the CLI keeps its documents and which indices it uses
 */

import * as path from "node:path";
import type { StoreConfig } from "@modelstore/sdk";

export interface GlobalOptions {
  root?: string;
  writeIndex?: string;
  indexPattern?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface StoreLocation {
  /** Absolute directory holding one subdirectory per index */
  root: string;
  /** Index settings given on the command line; the SDK fills the rest from env and defaults */
  overrides: Partial<StoreConfig>;
}

/**
 * Resolve the store location.
 * Root priority: --root > MODELSTORE_ROOT > ./data
 */
export function resolveStoreLocation(
  opts: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): StoreLocation {
  const overrides: Partial<StoreConfig> = {};
  if (opts.writeIndex !== undefined) overrides.writeIndex = opts.writeIndex;
  if (opts.indexPattern !== undefined) overrides.indexPattern = opts.indexPattern;

  return {
    root: path.resolve(opts.root ?? env.MODELSTORE_ROOT ?? "./data"),
    overrides,
  };
}

/**
 * Diagnostics are on with --verbose or MODELSTORE_CLI_DEBUG=1
 */
export function isDiagnosticsEnabled(
  opts: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return opts.verbose === true || env.MODELSTORE_CLI_DEBUG === "1";
}
