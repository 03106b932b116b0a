/**
 * Model config persistence over a document store
 */

import { performance } from "node:perf_hooks";
import type { DocumentStore, ModelConfig } from "./types.js";
import { JsonPayloadCodec, type PayloadCodec } from "./codec.js";
import { resolveStoreConfig, type StoreConfig } from "./config.js";
import { type Completion, fail, once, succeed, toPromise } from "./completion.js";
import {
  classifyStoreFailure,
  DeserializationError,
  ModelAlreadyExistsError,
  ModelNotFoundError,
  SerializationError,
  StorageReadError,
  StorageWriteError,
} from "./errors.js";
import { describeError, logger } from "./observability/logs.js";
import { metrics, type Operation } from "./observability/metrics.js";

export interface ModelConfigStoreOptions {
  documents: DocumentStore;
  /** Defaults to JsonPayloadCodec */
  codec?: PayloadCodec;
  /** Merged over resolveStoreConfig() */
  config?: Partial<StoreConfig>;
}

/**
 * Stores, retrieves and deletes model configs.
 *
 * Each operation sends exactly one request to the document store and reports through
 * its completion exactly once, with either a value or a ModelStoreError. Nothing is
 * retried. Writes go to the write index; reads and deletes span the index pattern, so
 * older generations of a model config remain visible until deleted.
 *
 * An exception thrown by a completion callback is logged as `completion.threw` and
 * does not propagate to the caller of store, get or delete; the operation's result
 * stands.
 *
 * @example
 * ```typescript
 * const models = openModelConfigStore({ documents: new InMemoryDocumentStore() });
 *
 * models.store(config, (outcome) => {
 *   if (!outcome.success && outcome.error.code === "ALREADY_EXISTS") {
 *     // pick another id
 *   }
 * });
 *
 * const latest = await models.getModel("my-model");
 * ```
 */
export class ModelConfigStore {
  readonly #documents: DocumentStore;
  readonly #codec: PayloadCodec;
  readonly #config: StoreConfig;

  constructor(options: ModelConfigStoreOptions) {
    this.#documents = options.documents;
    this.#codec = options.codec ?? new JsonPayloadCodec();
    this.#config = resolveStoreConfig(options.config);
  }

  get config(): StoreConfig {
    return this.#config;
  }

  /**
   * Create a model config in the write index. Never overwrites: a second store of the
   * same id fails with ModelAlreadyExistsError. The write is searchable once `onDone`
   * reports success.
   */
  store(config: ModelConfig, onDone: Completion<true>): void {
    const { modelId } = config;
    const done = this.#track("store", onDone);

    let payload: Uint8Array;
    try {
      payload = this.#codec.encode(config);
    } catch (err) {
      logger.error("model.serialize.failed", { modelId, message: describeError(err) });
      done(fail(new SerializationError(modelId, { cause: err })));
      return;
    }

    const request = this.#send(() =>
      this.#documents.createOnlyWrite({
        index: this.#config.writeIndex,
        id: modelId,
        payload,
        refresh: "immediate",
      })
    );

    void request
      .then(
        () => {
          logger.debug("model.stored", { modelId, message: this.#config.writeIndex });
          done(succeed(true));
        },
        (err: unknown) => {
          logger.error("model.store.failed", { modelId, message: describeError(err) });
          if (classifyStoreFailure(err) === "conflict") {
            done(fail(new ModelAlreadyExistsError(modelId, { cause: err })));
          } else {
            done(fail(new StorageWriteError(modelId, { cause: err })));
          }
        }
      )
      .catch((err: unknown) => done(fail(new StorageWriteError(modelId, { cause: err }))));
  }

  /**
   * Retrieve the latest version of a model config: among all matches across the index
   * pattern, the one in the greatest index name.
   */
  get(modelId: string, onDone: Completion<ModelConfig>): void {
    const done = this.#track("get", onDone);

    const request = this.#send(() =>
      this.#documents.search({
        indexPattern: this.#config.indexPattern,
        query: { constantScore: true, ids: [modelId] },
        sort: [{ field: "_index", order: "desc" }],
        size: 1,
      })
    );

    void request
      .then(
        (response) => {
          const hit = response.hits[0];
          if (!hit) {
            done(fail(new ModelNotFoundError(modelId)));
            return;
          }

          let config: ModelConfig;
          try {
            config = this.#codec.decode(hit.payload, { lenient: true });
          } catch (err) {
            logger.error("model.parse.failed", {
              modelId,
              message: describeError(err),
              details: { index: hit.index },
            });
            done(fail(new DeserializationError(modelId, { cause: err })));
            return;
          }
          done(succeed(config));
        },
        (err: unknown) => {
          // The pattern matching no index means nothing was ever stored
          if (classifyStoreFailure(err) === "index_not_found") {
            done(fail(new ModelNotFoundError(modelId, { cause: err })));
            return;
          }
          logger.error("model.get.failed", { modelId, message: describeError(err) });
          done(fail(new StorageReadError(modelId, { cause: err })));
        }
      )
      .catch((err: unknown) => done(fail(new StorageReadError(modelId, { cause: err }))));
  }

  /**
   * Delete every version of a model config across the index pattern
   */
  delete(modelId: string, onDone: Completion<true>): void {
    const done = this.#track("delete", onDone);

    const request = this.#send(() =>
      this.#documents.deleteByQuery({
        indexPattern: this.#config.indexPattern,
        query: { term: { field: this.#codec.idField, value: modelId } },
        abortOnVersionConflict: false,
        refresh: true,
      })
    );

    void request
      .then(
        (response) => {
          if (response.deleted === 0) {
            done(fail(new ModelNotFoundError(modelId)));
            return;
          }
          logger.debug("model.deleted", { modelId, details: { ...response } });
          done(succeed(true));
        },
        (err: unknown) => {
          if (classifyStoreFailure(err) === "index_not_found") {
            done(fail(new ModelNotFoundError(modelId, { cause: err })));
            return;
          }
          logger.error("model.delete.failed", { modelId, message: describeError(err) });
          done(fail(new StorageWriteError(modelId, { cause: err })));
        }
      )
      .catch((err: unknown) => done(fail(new StorageWriteError(modelId, { cause: err }))));
  }

  /**
   * Promise form of store()
   * @throws {ModelAlreadyExistsError | SerializationError | StorageWriteError}
   */
  storeModel(config: ModelConfig): Promise<true> {
    return toPromise((done) => this.store(config, done));
  }

  /**
   * Promise form of get()
   * @throws {ModelNotFoundError | DeserializationError | StorageReadError}
   */
  getModel(modelId: string): Promise<ModelConfig> {
    return toPromise((done) => this.get(modelId, done));
  }

  /**
   * Promise form of delete()
   * @throws {ModelNotFoundError | StorageWriteError}
   */
  deleteModel(modelId: string): Promise<true> {
    return toPromise((done) => this.delete(modelId, done));
  }

  /**
   * Issue a document store request, turning a synchronous throw into a rejection
   */
  #send<T>(request: () => Promise<T>): Promise<T> {
    try {
      return request();
    } catch (err) {
      return Promise.reject(err);
    }
  }

  #track<T>(op: Operation, onDone: Completion<T>): Completion<T> {
    const start = performance.now();
    return once((outcome) => {
      const ms = performance.now() - start;
      if (outcome.success) {
        metrics.recordSuccess(op, ms);
      } else {
        metrics.recordFailure(op, outcome.error.code, ms);
      }
      onDone(outcome);
    }, `${op} completion`);
  }
}

/**
 * Open a model config store over a document store
 */
export function openModelConfigStore(options: ModelConfigStoreOptions): ModelConfigStore {
  return new ModelConfigStore(options);
}
