/**
 * Error types for model config store operations
 *
 * Invariants:
 * - Every classified error names the model id it concerns
 * - Raw document store failures only ever appear as the `cause` of a classified error
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all model config store errors
 */
export abstract class ModelStoreError extends Error {
  abstract readonly code: ModelStoreErrorCode;

  constructor(
    public readonly modelId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type ModelStoreErrorCode =
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "SERIALIZATION_FAILED"
  | "DESERIALIZATION_FAILED"
  | "STORAGE_WRITE_FAILED"
  | "STORAGE_READ_FAILED";

/**
 * A model config with the same id already exists in the write index
 */
export class ModelAlreadyExistsError extends ModelStoreError {
  readonly code = "ALREADY_EXISTS";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Model config already exists: [${modelId}]`, options);
  }
}

/**
 * No model config matched the id, or no index matched the pattern
 */
export class ModelNotFoundError extends ModelStoreError {
  readonly code = "NOT_FOUND";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Model config not found: [${modelId}]`, options);
  }
}

/**
 * The model config could not be encoded; nothing was sent to the document store
 */
export class SerializationError extends ModelStoreError {
  readonly code = "SERIALIZATION_FAILED";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Failed to serialize model config: [${modelId}]`, options);
  }
}

/**
 * A stored payload was found but could not be parsed back into a model config
 */
export class DeserializationError extends ModelStoreError {
  readonly code = "DESERIALIZATION_FAILED";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Failed to parse stored model config: [${modelId}]`, options);
  }
}

/**
 * Thrown when a create or delete request fails for any unclassified reason
 */
export class StorageWriteError extends ModelStoreError {
  readonly code = "STORAGE_WRITE_FAILED";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Failed to write model config: [${modelId}]`, options);
  }
}

/**
 * Thrown when a search request fails for any reason other than a missing index
 */
export class StorageReadError extends ModelStoreError {
  readonly code = "STORAGE_READ_FAILED";

  constructor(modelId: string, options?: ErrorOptions) {
    super(modelId, `Failed to read model config: [${modelId}]`, options);
  }
}

/**
 * Failure kinds a document store reports
 */
export type StoreFailureKind = "conflict" | "index_not_found" | "other";

/**
 * Failure raised by a document store backend, tagged with its kind
 */
export class DocumentStoreError extends Error {
  constructor(
    public readonly kind: StoreFailureKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "DocumentStoreError";
  }
}

/**
 * Maximum number of `cause` links followed when classifying a failure
 */
const MAX_CAUSE_DEPTH = 10;

/**
 * Classify a failure reported by a document store.
 *
 * Walks the `cause` chain so that a conflict wrapped by a transport layer is still
 * recognized. Anything that is not a DocumentStoreError counts as "other".
 */
export function classifyStoreFailure(err: unknown): StoreFailureKind {
  let current: unknown = err;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (current instanceof DocumentStoreError) {
      return current.kind;
    }
    current = current.cause;
  }
  return "other";
}

/**
 * Type guard for classified store errors
 */
export function isModelStoreError(err: unknown): err is ModelStoreError {
  return err instanceof ModelStoreError;
}
