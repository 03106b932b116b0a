/**
 * In-process document store
 *
 * Indices are maps from id to payload. Every request resolves on a later microtask so
 * callers observe the same asynchrony as with a remote store.
 */

import { DocumentStoreError } from "../errors.js";
import type {
  CreateOnlyWriteRequest,
  DeleteByQueryRequest,
  DeleteByQueryResponse,
  DocumentStore,
  RefreshPolicy,
  SearchHit,
  SearchRequest,
  SearchResponse,
} from "../types.js";
import { matchIndices, matchesIds, matchesTerm, sortByIndex } from "./pattern.js";

export interface RecordedRequest {
  op: "create" | "search" | "deleteByQuery";
  refresh?: RefreshPolicy | boolean;
}

export class InMemoryDocumentStore implements DocumentStore {
  #indices = new Map<string, Map<string, Uint8Array>>();
  #requests: RecordedRequest[] = [];

  /**
   * Requests received so far, with the refresh policy each asked for
   */
  get requests(): readonly RecordedRequest[] {
    return this.#requests;
  }

  /**
   * Create an empty index, e.g. a new generation after a rollover. No-op if it exists.
   */
  createIndex(name: string): void {
    this.#open(name);
  }

  /**
   * Place a raw payload directly into an index, bypassing create-only semantics
   */
  seed(index: string, id: string, payload: Uint8Array | string): void {
    const bytes = typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
    this.#open(index).set(id, bytes);
  }

  listIndices(): string[] {
    return [...this.#indices.keys()].sort();
  }

  count(index: string): number {
    return this.#indices.get(index)?.size ?? 0;
  }

  async createOnlyWrite(request: CreateOnlyWriteRequest): Promise<void> {
    await Promise.resolve();
    this.#requests.push({ op: "create", refresh: request.refresh });

    // Check and insert without yielding: atomic per id
    const docs = this.#open(request.index);
    if (docs.has(request.id)) {
      throw new DocumentStoreError(
        "conflict",
        `[${request.id}]: version conflict, document already exists in [${request.index}]`
      );
    }
    docs.set(request.id, request.payload.slice());
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    await Promise.resolve();
    this.#requests.push({ op: "search" });

    const matched = this.#resolve(request.indexPattern);
    const hits: SearchHit[] = [];
    for (const index of matched) {
      for (const [id, payload] of this.#indices.get(index) ?? []) {
        if (matchesIds(request.query, id)) {
          hits.push({ index, id, payload: payload.slice() });
        }
      }
    }
    return { hits: sortByIndex(hits, request.sort).slice(0, request.size) };
  }

  async deleteByQuery(request: DeleteByQueryRequest): Promise<DeleteByQueryResponse> {
    await Promise.resolve();
    this.#requests.push({ op: "deleteByQuery", refresh: request.refresh });

    let deleted = 0;
    for (const index of this.#resolve(request.indexPattern)) {
      const docs = this.#indices.get(index);
      if (!docs) continue;
      for (const [id, payload] of [...docs]) {
        if (matchesTerm(request.query, payload)) {
          docs.delete(id);
          deleted++;
        }
      }
    }
    return { deleted, versionConflicts: 0 };
  }

  #open(name: string): Map<string, Uint8Array> {
    let docs = this.#indices.get(name);
    if (!docs) {
      docs = new Map();
      this.#indices.set(name, docs);
    }
    return docs;
  }

  #resolve(pattern: string): string[] {
    const matched = matchIndices(pattern, this.#indices.keys());
    if (matched.length === 0) {
      throw new DocumentStoreError("index_not_found", `no such index [${pattern}]`);
    }
    return matched;
  }
}
