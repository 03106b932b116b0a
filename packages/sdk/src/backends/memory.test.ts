import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryDocumentStore } from "./memory.js";
import { DocumentStoreError } from "../errors.js";
import type { SearchRequest } from "../types.js";

const bytes = (text: string) => new TextEncoder().encode(text);

const searchFor = (id: string, size = 10): SearchRequest => ({
  indexPattern: "idx-*",
  query: { constantScore: true, ids: [id] },
  sort: [{ field: "_index", order: "desc" }],
  size,
});

describe("InMemoryDocumentStore", () => {
  let store: InMemoryDocumentStore;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
  });

  it("should reject a second create of the same id with a conflict", async () => {
    await store.createOnlyWrite({ index: "idx-1", id: "a", payload: bytes("{}"), refresh: "immediate" });

    const err = await store
      .createOnlyWrite({ index: "idx-1", id: "a", payload: bytes("{}"), refresh: "immediate" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DocumentStoreError);
    expect(err).toMatchObject({ kind: "conflict" });
  });

  it("should create the target index on first write", async () => {
    await store.createOnlyWrite({ index: "idx-1", id: "a", payload: bytes("{}"), refresh: "none" });

    expect(store.listIndices()).toEqual(["idx-1"]);
    expect(store.count("idx-1")).toBe(1);
  });

  it("should allow the same id in different indices", async () => {
    await store.createOnlyWrite({ index: "idx-1", id: "a", payload: bytes("1"), refresh: "none" });
    await store.createOnlyWrite({ index: "idx-2", id: "a", payload: bytes("2"), refresh: "none" });

    const { hits } = await store.search(searchFor("a"));
    expect(hits.map((h) => [h.index, new TextDecoder().decode(h.payload)])).toEqual([
      ["idx-2", "2"],
      ["idx-1", "1"],
    ]);
  });

  it("should limit hits to the requested size", async () => {
    store.seed("idx-1", "a", "1");
    store.seed("idx-2", "a", "2");

    const { hits } = await store.search(searchFor("a", 1));
    expect(hits.map((h) => h.index)).toEqual(["idx-2"]);
  });

  it("should report index_not_found when the pattern matches nothing", async () => {
    await expect(store.search(searchFor("a"))).rejects.toMatchObject({ kind: "index_not_found" });
    await expect(
      store.deleteByQuery({
        indexPattern: "idx-*",
        query: { term: { field: "id", value: "a" } },
        abortOnVersionConflict: false,
        refresh: true,
      })
    ).rejects.toMatchObject({ kind: "index_not_found" });
  });

  it("should return no hits from an empty index", async () => {
    store.createIndex("idx-1");

    await expect(store.search(searchFor("a"))).resolves.toEqual({ hits: [] });
  });

  it("should delete matching documents in every matched index", async () => {
    store.seed("idx-1", "a", '{"id":"a"}');
    store.seed("idx-2", "a", '{"id":"a"}');
    store.seed("idx-2", "b", '{"id":"b"}');
    store.seed("other", "a", '{"id":"a"}');

    const response = await store.deleteByQuery({
      indexPattern: "idx-*",
      query: { term: { field: "id", value: "a" } },
      abortOnVersionConflict: false,
      refresh: true,
    });

    expect(response).toEqual({ deleted: 2, versionConflicts: 0 });
    expect([store.count("idx-1"), store.count("idx-2"), store.count("other")]).toEqual([0, 1, 1]);
  });

  it("should store a copy of the payload", async () => {
    const payload = bytes("{}");
    await store.createOnlyWrite({ index: "idx-1", id: "a", payload, refresh: "none" });
    payload[0] = 0x5b;

    const { hits } = await store.search(searchFor("a"));
    expect(new TextDecoder().decode(hits[0]?.payload)).toBe("{}");
  });

  it("should record refresh policies", async () => {
    store.createIndex("idx-1");
    await store.createOnlyWrite({ index: "idx-1", id: "a", payload: bytes("{}"), refresh: "immediate" });
    await store.search(searchFor("a"));

    expect(store.requests).toEqual([{ op: "create", refresh: "immediate" }, { op: "search" }]);
  });
});
