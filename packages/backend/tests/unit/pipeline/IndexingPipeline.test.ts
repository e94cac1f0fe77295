import { mkdtempSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexModelMismatchError } from "../../../src/errors.js";
import { Chunker } from "../../../src/pipeline/Chunker.js";
import { documentIdFor } from "../../../src/pipeline/DocumentLoader.js";
import { IndexingPipeline } from "../../../src/pipeline/IndexingPipeline.js";
import type { PipelineStatusEvent } from "../../../src/pipeline/types.js";
import { InMemoryVectorIndex } from "../../../src/store/InMemoryVectorIndex.js";
import { FakeEmbeddingGateway } from "../../helpers/FakeEmbeddingGateway.js";

const VACATION = "Vacation policy: employees receive 15 days of paid vacation per year.";
const REMOTE = "Remote work policy: staff may work from home two days per week.";
const EXPENSES = "Expense policy: submit receipts within 30 days. OUTAGE marker.";

describe("IndexingPipeline", () => {
  let root: string;
  let index: InMemoryVectorIndex;
  let embeddings: FakeEmbeddingGateway;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "lorebase-pipeline-"));
    index = new InMemoryVectorIndex();
    embeddings = new FakeEmbeddingGateway();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writeDoc(name: string, content: string): void {
    writeFileSync(join(root, name), content, "utf8");
  }

  function buildPipeline(chunkSize = 200, chunkOverlap = 20): IndexingPipeline {
    return new IndexingPipeline(
      index,
      embeddings,
      { chunker: new Chunker({ chunkSize, chunkOverlap, strategy: "fixed" }) },
      { batchSize: 8, embeddingConcurrency: 2, indexConcurrency: 2, probeTopK: 3 }
    );
  }

  it("indexes what it can when one document fails to embed", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("b.txt", REMOTE);
    writeDoc("c.txt", EXPENSES);
    embeddings.failWhen = (text) => text.includes("OUTAGE");

    const report = await buildPipeline().run({ directory: root });

    expect(report.outcomes.map((outcome) => [outcome.sourcePath, outcome.status])).toEqual([
      ["a.txt", "indexed"],
      ["b.txt", "indexed"],
      ["c.txt", "failed"]
    ]);
    expect(report.outcomes[2]).toEqual({
      sourcePath: "c.txt",
      documentId: documentIdFor("c.txt"),
      status: "failed",
      chunkCount: 0,
      embeddedChunkCount: 0,
      stage: "embedding",
      error: "Embedding service call failed: simulated outage"
    });
    expect(report.totals).toEqual({
      documents: 2,
      indexed: 2,
      unchanged: 0,
      empty: 0,
      removed: 0,
      failed: 1,
      chunks: 2,
      averageChunkSize: 66
    });
    expect(report.sources).toEqual(["a.txt", "b.txt"]);
    expect(report.force).toBe(false);
    await expect(index.getDocument(documentIdFor("c.txt"))).resolves.toBeNull();
  });

  it("skips unchanged documents on a second run", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("b.txt", REMOTE);
    const pipeline = buildPipeline();

    await pipeline.run({ directory: root });
    expect(embeddings.embeddedTexts).toHaveLength(2);

    const report = await pipeline.run({ directory: root });

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["unchanged", "unchanged"]);
    expect(report.outcomes[0]?.chunkCount).toBe(1);
    expect(report.totals.chunks).toBe(2);
    expect(embeddings.embeddedTexts).toHaveLength(2);
  });

  it("re-embeds only the chunks whose text changed", async () => {
    writeDoc("a.txt", "aaaa bbbb cccc dddd eeee ffff");
    const pipeline = buildPipeline(20, 0);
    await pipeline.run({ directory: root });
    expect(embeddings.embeddedTexts).toEqual(["aaaa bbbb cccc dddd ", "eeee ffff"]);

    writeDoc("a.txt", "aaaa bbbb cccc dddd gggg hhhh");
    const report = await pipeline.run({ directory: root });

    expect(report.outcomes[0]).toMatchObject({ status: "indexed", chunkCount: 2, embeddedChunkCount: 1 });
    expect(embeddings.embeddedTexts).toEqual(["aaaa bbbb cccc dddd ", "eeee ffff", "gggg hhhh"]);
    const stored = await index.getChunksByDocument(documentIdFor("a.txt"));
    expect(stored.map((item) => item.chunk.text)).toEqual(["aaaa bbbb cccc dddd ", "gggg hhhh"]);
  });

  it("removes documents whose files are gone unless pruning is off", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("b.txt", REMOTE);
    const pipeline = buildPipeline();
    await pipeline.run({ directory: root });

    unlinkSync(join(root, "b.txt"));
    const kept = await pipeline.run({ directory: root, prune: false });
    expect(kept.sources).toEqual(["a.txt", "b.txt"]);

    const report = await pipeline.run({ directory: root });

    expect(report.outcomes).toEqual([
      { sourcePath: "a.txt", documentId: documentIdFor("a.txt"), status: "unchanged", chunkCount: 1, embeddedChunkCount: 0 },
      { sourcePath: "b.txt", documentId: documentIdFor("b.txt"), status: "removed", chunkCount: 1, embeddedChunkCount: 0 }
    ]);
    expect(report.totals.removed).toBe(1);
    expect(report.sources).toEqual(["a.txt"]);
  });

  it("rebuilds everything when forced", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("b.txt", REMOTE);
    const pipeline = buildPipeline();
    await pipeline.run({ directory: root });

    const report = await pipeline.run({ directory: root, force: true });

    expect(report.force).toBe(true);
    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["indexed", "indexed"]);
    expect(embeddings.embeddedTexts).toHaveLength(4);
  });

  it("refuses to mix embedding models unless forced", async () => {
    writeDoc("a.txt", VACATION);
    index = new InMemoryVectorIndex({ model: "older-embed", dimensions: 256 });

    await expect(buildPipeline().run({ directory: root })).rejects.toBeInstanceOf(IndexModelMismatchError);
    expect(embeddings.embeddedTexts).toEqual([]);

    const report = await buildPipeline().run({ directory: root, force: true });
    expect(report.totals.indexed).toBe(1);
    await expect(index.getModelInfo()).resolves.toEqual({ model: "fake-embed", dimensions: 256 });
  });

  it("records blank documents as empty", async () => {
    writeDoc("blank.txt", "  \n\t\n");

    const report = await buildPipeline().run({ directory: root });

    expect(report.outcomes[0]).toMatchObject({ sourcePath: "blank.txt", status: "empty", chunkCount: 0 });
    expect(report.totals.empty).toBe(1);
    await expect(index.getDocument(documentIdFor("blank.txt"))).resolves.toMatchObject({ chunkCount: 0 });
  });

  it("reports files that cannot be parsed as ingestion failures", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("scan.pdf", "no pdf header here");

    const report = await buildPipeline().run({ directory: root });

    expect(report.outcomes[1]).toEqual({
      sourcePath: "scan.pdf",
      documentId: null,
      status: "failed",
      chunkCount: 0,
      embeddedChunkCount: 0,
      stage: "ingestion",
      error: "Failed to ingest scan.pdf: File has a .pdf extension but no PDF signature."
    });
    expect(report.totals.indexed).toBe(1);
  });

  it("searches the fresh index with a probe question", async () => {
    writeDoc("a.txt", VACATION);
    writeDoc("b.txt", REMOTE);

    const report = await buildPipeline().run({ directory: root, probe: "How many vacation days?" });

    expect(report.probe?.query).toBe("How many vacation days?");
    expect(report.probe?.hits.map((hit) => hit.documentName)).toEqual(["a.txt", "b.txt"]);
    expect(report.probe?.hits[0]?.excerpt).toBe(VACATION);
  });

  it("emits status events for every phase of a document", async () => {
    writeDoc("a.txt", VACATION);
    const pipeline = buildPipeline();
    const events: PipelineStatusEvent[] = [];
    pipeline.onStatus((event) => events.push(event));

    await pipeline.run({ directory: root });

    expect(events.map((event) => event.phase)).toEqual(["loading", "chunking", "embedding", "saving", "completed"]);
    expect(events[4]).toEqual({
      documentId: documentIdFor("a.txt"),
      sourcePath: "a.txt",
      phase: "completed",
      progress: 100
    });
  });

  it("removes a single document on request", async () => {
    writeDoc("a.txt", VACATION);
    const pipeline = buildPipeline();
    await pipeline.run({ directory: root });

    await expect(pipeline.removeDocument(documentIdFor("a.txt"))).resolves.toBe(true);
    await expect(pipeline.removeDocument(documentIdFor("a.txt"))).resolves.toBe(false);
    await expect(index.stats()).resolves.toMatchObject({ chunkCount: 0 });
  });
});
