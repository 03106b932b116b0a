/**
 * Filesystem document store
 *
 * Layout: `<root>/<index>/<encoded id>.json`, one directory per index. Create-only writes
 * rely on exclusive file creation, so concurrent creators of one id race on the
 * filesystem and exactly one wins.
 */

import * as path from "node:path";
import { DocumentStoreError } from "../errors.js";
import {
  createExclusive,
  ensureDirectory,
  listDirectories,
  listFiles,
  readPayload,
  removeFile,
  syncDirectory,
} from "../io.js";
import type {
  CreateOnlyWriteRequest,
  DeleteByQueryRequest,
  DeleteByQueryResponse,
  DocumentStore,
  SearchHit,
  SearchRequest,
  SearchResponse,
} from "../types.js";
import { matchIndices, matchesTerm, sortByIndex } from "./pattern.js";

const DOC_EXTENSION = ".json";

const VALID_INDEX_NAME = /^[^\\/*?"<>|,\s]+$/;

export function encodeDocumentId(id: string): string {
  return `${encodeURIComponent(id)}${DOC_EXTENSION}`;
}

export function decodeDocumentId(fileName: string): string {
  return decodeURIComponent(fileName.slice(0, -DOC_EXTENSION.length));
}

export class FsDocumentStore implements DocumentStore {
  readonly #root: string;

  constructor(root: string) {
    this.#root = path.resolve(root);
  }

  get root(): string {
    return this.#root;
  }

  /**
   * Create an empty index directory, e.g. a new generation after a rollover
   */
  async createIndex(name: string): Promise<void> {
    await ensureDirectory(this.#indexDir(name));
  }

  async createOnlyWrite(request: CreateOnlyWriteRequest): Promise<void> {
    const file = path.join(this.#indexDir(request.index), encodeDocumentId(request.id));
    await createExclusive(file, request.payload, request.refresh === "immediate");
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const indices = await this.#resolve(request.indexPattern);
    const hits: SearchHit[] = [];

    for (const index of indices) {
      for (const id of new Set(request.query.ids)) {
        const payload = await readPayload(path.join(this.#indexDir(index), encodeDocumentId(id)));
        if (payload) {
          hits.push({ index, id, payload });
        }
      }
    }

    return { hits: sortByIndex(hits, request.sort).slice(0, request.size) };
  }

  async deleteByQuery(request: DeleteByQueryRequest): Promise<DeleteByQueryResponse> {
    const indices = await this.#resolve(request.indexPattern);
    let deleted = 0;
    let versionConflicts = 0;

    for (const index of indices) {
      const dir = this.#indexDir(index);
      let touched = false;

      for (const fileName of await listFiles(dir, DOC_EXTENSION)) {
        const file = path.join(dir, fileName);
        const payload = await readPayload(file);
        if (!payload || !matchesTerm(request.query, payload)) {
          continue;
        }

        if (await removeFile(file)) {
          deleted++;
          touched = true;
        } else {
          // Removed by someone else between read and delete
          versionConflicts++;
          if (request.abortOnVersionConflict) {
            throw new DocumentStoreError(
              "conflict",
              `[${decodeDocumentId(fileName)}]: version conflict in [${index}]`
            );
          }
        }
      }

      if (touched && request.refresh) {
        await syncDirectory(dir);
      }
    }

    return { deleted, versionConflicts };
  }

  #indexDir(index: string): string {
    if (!VALID_INDEX_NAME.test(index) || index === "." || index === "..") {
      throw new DocumentStoreError("other", `Invalid index name [${index}]`);
    }
    return path.join(this.#root, index);
  }

  async #resolve(pattern: string): Promise<string[]> {
    const matched = matchIndices(pattern, await listDirectories(this.#root));
    if (matched.length === 0) {
      throw new DocumentStoreError("index_not_found", `no such index [${pattern}]`);
    }
    return matched;
  }
}
