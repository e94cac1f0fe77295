import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { EmbeddingModelInfo, VectorIndex } from "@lorebase/shared";
import { IndexModelMismatchError } from "../../src/errors.js";
import { buildChunk, buildIndexedDocument, buildRecord } from "./fixtures.js";

const MODEL: EmbeddingModelInfo = { model: "fake-embed", dimensions: 3 };

/** Behaviour every VectorIndex implementation shares. */
export function describeVectorIndexContract(name: string, createIndex: () => VectorIndex): void {
  describe(`${name} contract`, () => {
    let index: VectorIndex;

    beforeEach(() => {
      index = createIndex();
    });

    afterEach(async () => {
      await index.close();
    });

    it("returns nothing when searching an empty index", async () => {
      await expect(index.search([1, 0, 0], 3)).resolves.toEqual([]);
      await expect(index.stats()).resolves.toEqual({ documentCount: 0, chunkCount: 0, characterCount: 0 });
    });

    it("refuses records before a model is pinned", async () => {
      const chunk = buildChunk("a", 0, "alpha");
      await expect(index.upsert([buildRecord(chunk, [1, 0, 0])])).rejects.toThrow("no embedding model pinned");
    });

    it("ranks by cosine similarity", async () => {
      await index.reset(MODEL);
      await index.upsert([
        buildRecord(buildChunk("a", 0, "alpha"), [1, 0, 0]),
        buildRecord(buildChunk("b", 0, "beta"), [0, 1, 0]),
        buildRecord(buildChunk("c", 0, "gamma"), [1, 1, 0])
      ]);

      const results = await index.search([2, 0, 0], 2);

      expect(results.map((item) => item.chunk.id)).toEqual(["a:0", "c:0"]);
      expect(results[0]?.score).toBeCloseTo(1, 10);
      expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
      expect(results[0]?.document).toEqual({ id: "a", name: "a.txt", sourcePath: "a.txt" });
      await expect(index.search([1, 0, 0], 0)).resolves.toEqual([]);
    });

    it("breaks score ties by insertion order and keeps it across upserts", async () => {
      await index.reset(MODEL);
      const x = buildRecord(buildChunk("x", 0, "same"), [0, 0, 1]);
      const y = buildRecord(buildChunk("y", 0, "same"), [0, 0, 1]);
      await index.upsert([x]);
      await index.upsert([y]);
      await index.upsert([{ ...x, chunk: { ...x.chunk, text: "same again" } }]);

      let results = await index.search([0, 0, 1], 5);
      expect(results.map((item) => item.chunk.id)).toEqual(["x:0", "y:0"]);
      expect(results[0]?.chunk.text).toBe("same again");

      await index.replaceDocument(buildIndexedDocument("x", 1), [x]);
      results = await index.search([0, 0, 1], 5);
      expect(results.map((item) => item.chunk.id)).toEqual(["y:0", "x:0"]);
    });

    it("replaces every chunk of a document at once", async () => {
      await index.reset(MODEL);
      await index.replaceDocument(buildIndexedDocument("doc", 2), [
        buildRecord(buildChunk("doc", 0, "first", 0), [1, 0, 0]),
        buildRecord(buildChunk("doc", 5, "second", 1), [0, 1, 0])
      ]);
      await index.replaceDocument(buildIndexedDocument("doc", 1, { contentHash: "hash-2" }), [
        buildRecord(buildChunk("doc", 0, "rewritten", 0), [0, 0, 1])
      ]);

      const chunks = await index.getChunksByDocument("doc");
      expect(chunks.map((item) => item.chunk.text)).toEqual(["rewritten"]);
      expect(chunks[0]?.vector).toEqual([0, 0, 1]);

      const document = await index.getDocument("doc");
      expect(document?.chunkCount).toBe(1);
      expect(document?.contentHash).toBe("hash-2");
      expect(document?.ingestedAt.toISOString()).toBe("2024-01-01T00:00:00.000Z");
      await expect(index.stats()).resolves.toEqual({ documentCount: 1, chunkCount: 1, characterCount: 9 });
    });

    it("rejects a replacement holding another document's chunk and writes nothing", async () => {
      await index.reset(MODEL);
      await expect(
        index.replaceDocument(buildIndexedDocument("doc", 1), [
          buildRecord(buildChunk("other", 0, "stray"), [1, 0, 0])
        ])
      ).rejects.toThrow("belongs to other");

      await expect(index.getDocument("doc")).resolves.toBeNull();
      await expect(index.stats()).resolves.toEqual({ documentCount: 0, chunkCount: 0, characterCount: 0 });
    });

    it("rejects duplicate chunk ids in one batch", async () => {
      await index.reset(MODEL);
      const record = buildRecord(buildChunk("a", 0, "alpha"), [1, 0, 0]);
      await expect(index.upsert([record, record])).rejects.toThrow("Duplicate chunk id in batch: a:0");
    });

    it("rejects vectors of the wrong dimensionality", async () => {
      await index.reset(MODEL);
      await expect(
        index.upsert([buildRecord(buildChunk("a", 0, "alpha"), [1, 0])])
      ).rejects.toBeInstanceOf(IndexModelMismatchError);

      await index.upsert([buildRecord(buildChunk("a", 0, "alpha"), [1, 0, 0])]);
      await expect(index.search([1, 0], 1)).rejects.toBeInstanceOf(IndexModelMismatchError);
    });

    it("pins the model on first use and rejects a different one afterwards", async () => {
      await expect(index.getModelInfo()).resolves.toBeNull();
      await index.assertCompatible(MODEL);
      await expect(index.getModelInfo()).resolves.toEqual(MODEL);

      await expect(index.assertCompatible(MODEL)).resolves.toBeUndefined();
      await expect(index.assertCompatible({ model: "other-embed", dimensions: 3 })).rejects.toBeInstanceOf(
        IndexModelMismatchError
      );
      await expect(index.assertCompatible({ model: "fake-embed", dimensions: 4 })).rejects.toBeInstanceOf(
        IndexModelMismatchError
      );
    });

    it("deletes a document and reports whether anything was removed", async () => {
      await index.reset(MODEL);
      await index.replaceDocument(buildIndexedDocument("doc", 1), [
        buildRecord(buildChunk("doc", 0, "only"), [1, 0, 0])
      ]);

      await expect(index.deleteDocument("doc")).resolves.toBe(true);
      await expect(index.deleteDocument("doc")).resolves.toBe(false);
      await expect(index.listDocuments()).resolves.toEqual([]);
      await expect(index.search([1, 0, 0], 1)).resolves.toEqual([]);
    });

    it("lists documents by source path and counts distinct documents", async () => {
      await index.reset(MODEL);
      await index.replaceDocument(buildIndexedDocument("b", 2), [
        buildRecord(buildChunk("b", 0, "bb", 0), [1, 0, 0]),
        buildRecord(buildChunk("b", 2, "bbb", 1), [0, 1, 0])
      ]);
      await index.replaceDocument(buildIndexedDocument("a", 1), [
        buildRecord(buildChunk("a", 0, "a", 0), [0, 0, 1])
      ]);

      const documents = await index.listDocuments();
      expect(documents.map((item) => item.sourcePath)).toEqual(["a.txt", "b.txt"]);
      await expect(index.stats()).resolves.toEqual({ documentCount: 2, chunkCount: 3, characterCount: 6 });
    });

    it("drops everything on reset and pins the new model", async () => {
      await index.reset(MODEL);
      await index.upsert([buildRecord(buildChunk("a", 0, "alpha"), [1, 0, 0])]);

      const next: EmbeddingModelInfo = { model: "other-embed", dimensions: 2 };
      await index.reset(next);

      await expect(index.stats()).resolves.toEqual({ documentCount: 0, chunkCount: 0, characterCount: 0 });
      await expect(index.getModelInfo()).resolves.toEqual(next);
      await index.upsert([buildRecord(buildChunk("a", 0, "alpha"), [1, 0])]);
      await expect(index.search([1, 0], 1)).resolves.toHaveLength(1);
    });
  });
}
