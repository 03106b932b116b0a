/**
 * Model Config Store SDK
 *
 * Create-only persistence of versioned model configs over a searchable document store
 */

// Re-export types
export type {
  ModelConfig,
  ModelInput,
  RefreshPolicy,
  CreateOnlyWriteRequest,
  IdsQuery,
  TermQuery,
  SortClause,
  SearchRequest,
  SearchHit,
  SearchResponse,
  DeleteByQueryRequest,
  DeleteByQueryResponse,
  DocumentStore,
} from "./types.js";

// Provider
export { ModelConfigStore, openModelConfigStore } from "./provider.js";
export type { ModelConfigStoreOptions } from "./provider.js";
export { once, toPromise, succeed, fail } from "./completion.js";
export type { Completion, Outcome } from "./completion.js";

// Codec
export { JsonPayloadCodec, toJSON, fromJSON, MODEL_CONFIG_DOC_TYPE } from "./codec.js";
export type { PayloadCodec, DecodeOptions, StoredModelConfig } from "./codec.js";
export { PayloadWriter, withPayloadWriter, writeCanonical, CanonicalFormError } from "./format/canonical.js";

// Configuration
export {
  resolveStoreConfig,
  generationIndexName,
  StoreConfigSchema,
  INDEX_NAME_PREFIX,
  DEFAULT_WRITE_INDEX,
  DEFAULT_INDEX_PATTERN,
} from "./config.js";
export type { StoreConfig } from "./config.js";

// Backends
export { InMemoryDocumentStore } from "./backends/memory.js";
export type { RecordedRequest } from "./backends/memory.js";
export { FsDocumentStore } from "./backends/fs.js";
export { patternToRegExp, matchIndices } from "./backends/pattern.js";

// Observability
export { logger, describeError } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { Operation, OperationMetrics } from "./observability/metrics.js";

// Errors
export {
  ModelStoreError,
  ModelAlreadyExistsError,
  ModelNotFoundError,
  SerializationError,
  DeserializationError,
  StorageWriteError,
  StorageReadError,
  DocumentStoreError,
  classifyStoreFailure,
  isModelStoreError,
} from "./errors.js";
export type { ModelStoreErrorCode, StoreFailureKind } from "./errors.js";
