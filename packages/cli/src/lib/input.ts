/**
 * Reading the model config given to `put`
 */

import { readFile } from "node:fs/promises";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

export const MAX_INPUT_BYTES = 10 * 1024 * 1024;

export interface PutSource {
  file?: string;
  data?: string;
}

/** The subset of process.stdin the CLI reads from */
export interface InputStream extends AsyncIterable<string | Uint8Array> {
  isTTY?: boolean;
}

async function readStream(stream: InputStream, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    size += buffer.length;
    if (size > maxBytes) {
      throw new CliError(`Model config on stdin exceeds ${maxBytes} bytes`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read the raw model config document from --file, --data or stdin, in that order.
 * The result is parsed JSON, not yet validated as a model config.
 */
export async function readModelConfigSource(
  source: PutSource,
  stdin: InputStream = process.stdin,
  maxBytes = MAX_INPUT_BYTES
): Promise<unknown> {
  if (source.file !== undefined && source.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (source.file !== undefined) {
    let content: string;
    try {
      content = await readFile(source.file, "utf8");
    } catch (err) {
      throw new CliError(
        `Cannot read ${source.file}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    return parseJson(content, `file ${source.file}`);
  }

  if (source.data !== undefined) {
    return parseJson(source.data, "--data");
  }

  if (stdin.isTTY === true) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  return parseJson(await readStream(stdin, maxBytes), "stdin");
}
