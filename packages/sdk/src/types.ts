/**
 * Core types for the model config store
 */

/**
 * Declared input of a model
 */
export interface ModelInput {
  /** Document fields the model reads */
  fieldNames: string[];
}

/**
 * A versioned model configuration.
 *
 * Everything except `modelId` is opaque to the provider and owned by the payload codec.
 */
export interface ModelConfig {
  /** Unique, caller supplied identifier; used as the document id */
  modelId: string;
  createdBy: string;
  version: string;
  description?: string;
  /** Creation time in epoch milliseconds */
  createTime: number;
  tags: string[];
  metadata?: Record<string, unknown>;
  input: ModelInput;
  /** Serialized model definition, stored as is */
  definition?: Record<string, unknown>;
}

/**
 * Refresh policy for a write. "immediate" makes the write searchable before the
 * request completes.
 */
export type RefreshPolicy = "none" | "immediate";

export interface CreateOnlyWriteRequest {
  /** Concrete index name (never a pattern) */
  index: string;
  id: string;
  payload: Uint8Array;
  refresh: RefreshPolicy;
}

/**
 * Query matching documents by id, with every hit scoring the same
 */
export interface IdsQuery {
  constantScore: true;
  ids: string[];
}

/**
 * Query matching documents whose top-level field equals a value exactly
 */
export interface TermQuery {
  term: { field: string; value: string };
}

export interface SortClause {
  field: "_index";
  order: "asc" | "desc";
}

export interface SearchRequest {
  indexPattern: string;
  query: IdsQuery;
  sort: SortClause[];
  size: number;
}

export interface SearchHit {
  /** Concrete index the hit was found in */
  index: string;
  id: string;
  payload: Uint8Array;
}

export interface SearchResponse {
  hits: SearchHit[];
}

export interface DeleteByQueryRequest {
  indexPattern: string;
  query: TermQuery;
  /** When false, documents that changed concurrently are skipped instead of failing the request */
  abortOnVersionConflict: boolean;
  /** Refresh affected indices before responding */
  refresh: boolean;
}

export interface DeleteByQueryResponse {
  deleted: number;
  versionConflicts: number;
}

/**
 * Document store the provider persists into.
 *
 * Implementations reject with a DocumentStoreError tagged with the failure kind:
 * - `conflict`: createOnlyWrite found an existing document with the same id
 * - `index_not_found`: the index pattern matched no index
 * - `other`: any other failure
 */
export interface DocumentStore {
  /**
   * Create a document, failing with a conflict if the id already exists in the index.
   * Must be atomic per id.
   */
  createOnlyWrite(request: CreateOnlyWriteRequest): Promise<void>;

  /**
   * Search the indices matching a pattern
   */
  search(request: SearchRequest): Promise<SearchResponse>;

  /**
   * Delete every document matching a query across the indices matching a pattern
   */
  deleteByQuery(request: DeleteByQueryRequest): Promise<DeleteByQueryResponse>;
}
