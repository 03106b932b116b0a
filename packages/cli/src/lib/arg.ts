/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Option parser: validate a concrete index name (no wildcards, separators or path segments)
 */
export function parseIndexName(value: string): string {
  const trimmed = value.trim();

  if (!/^[^\\/*?"<>|,\s]+$/.test(trimmed) || trimmed === "." || trimmed === "..") {
    throw new InvalidArgumentError(
      "index name must not be empty or contain wildcards, commas, whitespace or path separators"
    );
  }

  return trimmed;
}

/**
 * Option parser: validate an index pattern (wildcards and commas allowed, path separators not)
 */
export function parseIndexPattern(value: string): string {
  const trimmed = value.trim();

  if (trimmed.length === 0 || /[\\/]/.test(trimmed)) {
    throw new InvalidArgumentError("index pattern must not be empty or contain path separators");
  }

  return trimmed;
}
