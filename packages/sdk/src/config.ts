/**
 * Index naming and store configuration
 *
 * Writes go to a single write index; reads and deletes go to an index pattern that
 * matches the write index and any older generations still holding documents.
 */

import { z } from "zod";
import { patternToRegExp } from "./backends/pattern.js";

export const INDEX_NAME_PREFIX = ".model-configs-";
export const INDEX_GENERATION = 1;

/**
 * Name of the index for a given generation, e.g. `.model-configs-000002`
 */
export function generationIndexName(generation: number, prefix = INDEX_NAME_PREFIX): string {
  if (!Number.isInteger(generation) || generation < 1 || generation > 999999) {
    throw new RangeError(`Index generation must be an integer between 1 and 999999, got ${generation}`);
  }
  return `${prefix}${String(generation).padStart(6, "0")}`;
}

export const DEFAULT_WRITE_INDEX = generationIndexName(INDEX_GENERATION);
export const DEFAULT_INDEX_PATTERN = `${INDEX_NAME_PREFIX}*`;

export const StoreConfigSchema = z
  .object({
    writeIndex: z
      .string()
      .min(1)
      .refine((name) => !name.includes("*"), "writeIndex must be a concrete index name"),
    indexPattern: z.string().min(1),
  })
  .superRefine((config, ctx) => {
    if (!patternToRegExp(config.indexPattern).test(config.writeIndex)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["indexPattern"],
        message: `indexPattern "${config.indexPattern}" does not match writeIndex "${config.writeIndex}"`,
      });
    }
  });

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

/**
 * Resolve store configuration.
 * Priority: explicit overrides > MODELSTORE_WRITE_INDEX / MODELSTORE_INDEX_PATTERN > defaults
 * @throws ZodError if the resulting configuration is invalid
 */
export function resolveStoreConfig(
  overrides: Partial<StoreConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): StoreConfig {
  return StoreConfigSchema.parse({
    writeIndex: overrides.writeIndex ?? env.MODELSTORE_WRITE_INDEX ?? DEFAULT_WRITE_INDEX,
    indexPattern: overrides.indexPattern ?? env.MODELSTORE_INDEX_PATTERN ?? DEFAULT_INDEX_PATTERN,
  });
}
