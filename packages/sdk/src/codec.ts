/**
 * Payload codec for model configs
 *
 * The storage form is snake_case JSON with canonical key order. Encoded payloads carry
 * a `doc_type` marker so the documents can share indices with other document types.
 */

import { z } from "zod";
import type { ModelConfig } from "./types.js";
import { withPayloadWriter, writeCanonical } from "./format/canonical.js";

export const MODEL_CONFIG_DOC_TYPE = "trained_model_config";

export interface DecodeOptions {
  /** Tolerate unknown fields (they are dropped). When false, unknown fields are rejected. */
  lenient: boolean;
}

/**
 * Converts model configs to and from stored payloads. Both methods throw on failure.
 */
export interface PayloadCodec {
  /** Top-level payload field holding the model id, used for exact-match deletes */
  readonly idField: string;
  encode(config: ModelConfig): Uint8Array;
  decode(payload: Uint8Array, options: DecodeOptions): ModelConfig;
}

const InputSchema = z.object({
  field_names: z.array(z.string()),
});

const StrictStoredModelConfigSchema = z
  .object({
    model_id: z.string().min(1),
    created_by: z.string(),
    version: z.string(),
    description: z.string().optional(),
    create_time: z.number().int().nonnegative(),
    tags: z.array(z.string()).default([]),
    metadata: z.record(z.string(), z.unknown()).optional(),
    input: InputSchema.strict(),
    definition: z.record(z.string(), z.unknown()).optional(),
    doc_type: z.literal(MODEL_CONFIG_DOC_TYPE).optional(),
  })
  .strict();

// Unknown fields at any level are dropped instead of rejected
const LenientStoredModelConfigSchema = StrictStoredModelConfigSchema.extend({
  input: InputSchema.strip(),
}).strip();

/**
 * Model config in its storage (snake_case) form
 */
export type StoredModelConfig = z.input<typeof StrictStoredModelConfigSchema>;

/**
 * Convert a model config to its storage form
 * @param forStorage - Include the internal `doc_type` marker
 */
export function toJSON(config: ModelConfig, forStorage = false): StoredModelConfig {
  return {
    model_id: config.modelId,
    created_by: config.createdBy,
    version: config.version,
    description: config.description,
    create_time: config.createTime,
    tags: config.tags,
    metadata: config.metadata,
    input: { field_names: config.input.fieldNames },
    definition: config.definition,
    doc_type: forStorage ? MODEL_CONFIG_DOC_TYPE : undefined,
  };
}

/**
 * Build a model config from its storage form
 * @throws ZodError if the value does not describe a model config
 */
export function fromJSON(value: unknown, options: DecodeOptions): ModelConfig {
  const stored = options.lenient
    ? LenientStoredModelConfigSchema.parse(value)
    : StrictStoredModelConfigSchema.parse(value);

  const config: ModelConfig = {
    modelId: stored.model_id,
    createdBy: stored.created_by,
    version: stored.version,
    createTime: stored.create_time,
    tags: stored.tags,
    input: { fieldNames: stored.input.field_names },
  };
  if (stored.description !== undefined) config.description = stored.description;
  if (stored.metadata !== undefined) config.metadata = stored.metadata;
  if (stored.definition !== undefined) config.definition = stored.definition;
  return config;
}

/**
 * Default codec: canonical UTF-8 JSON
 */
export class JsonPayloadCodec implements PayloadCodec {
  readonly idField = "model_id";

  /**
   * @throws ZodError if the config would not decode again, CanonicalFormError if a
   * value has no JSON form
   */
  encode(config: ModelConfig): Uint8Array {
    const stored = toJSON(config, true);
    StrictStoredModelConfigSchema.parse(stored);

    return withPayloadWriter((writer) => {
      writeCanonical(writer, stored);
      return writer.toBytes();
    });
  }

  decode(payload: Uint8Array, options: DecodeOptions): ModelConfig {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(payload);
    return fromJSON(JSON.parse(text), options);
  }
}
