import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type {
  DocumentChunk,
  DocumentFileType,
  EmbeddingModelInfo,
  IndexRecord,
  IndexStats,
  IndexedDocument,
  RetrievalResult,
  StoredChunk,
  VectorIndex
} from "@lorebase/shared";
import { getIndexPath } from "../config.js";
import {
  assertModelMatches,
  assertQueryVector,
  rankEntries,
  validateRecords,
  type SearchEntry
} from "./indexSupport.js";

export interface SqliteVectorIndexOptions {
  dbPath?: string;
}

interface MetaRow {
  key: string;
  value: string;
}

interface DocumentRow {
  id: string;
  name: string;
  source_path: string;
  file_type: DocumentFileType;
  content_hash: string;
  chunk_count: number;
  ingested_at: string;
}

interface ChunkRow {
  seq: number;
  id: string;
  document_id: string;
  document_name: string;
  source_path: string;
  chunk_index: number;
  text: string;
  start_offset: number;
  end_offset: number;
  previous_chunk_id: string | null;
  next_chunk_id: string | null;
  vector: Buffer;
}

interface ChunkParams {
  id: string;
  document_id: string;
  document_name: string;
  source_path: string;
  chunk_index: number;
  text: string;
  start_offset: number;
  end_offset: number;
  previous_chunk_id: string | null;
  next_chunk_id: string | null;
  vector: Buffer;
}

const CHUNK_COLUMNS = `seq, id, document_id, document_name, source_path, chunk_index, text,
  start_offset, end_offset, previous_chunk_id, next_chunk_id, vector`;

/**
 * One knowledge base per SQLite file. Writes run in a transaction; searches read an
 * immutable in-process snapshot that is swapped out after each commit, so a search never
 * sees half of a document.
 */
export class SqliteVectorIndex implements VectorIndex {
  private readonly db: Database.Database;
  private snapshot: SearchEntry[] | null = null;
  private modelInfo: EmbeddingModelInfo | null;

  constructor(options: SqliteVectorIndexOptions = {}) {
    const dbPath = options.dbPath === ":memory:" ? ":memory:" : resolve(options.dbPath ?? getIndexPath());
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.initializeSchema();
    this.modelInfo = this.readModelInfo();
  }

  async upsert(records: IndexRecord[]): Promise<void> {
    validateRecords(this.modelInfo, records);
    if (records.length === 0) {
      return;
    }

    const statement = this.db.prepare<ChunkParams>(`
      INSERT INTO chunks (
        id, document_id, document_name, source_path, chunk_index, text,
        start_offset, end_offset, previous_chunk_id, next_chunk_id, vector
      )
      VALUES (
        @id, @document_id, @document_name, @source_path, @chunk_index, @text,
        @start_offset, @end_offset, @previous_chunk_id, @next_chunk_id, @vector
      )
      ON CONFLICT(id) DO UPDATE SET
        document_id = excluded.document_id,
        document_name = excluded.document_name,
        source_path = excluded.source_path,
        chunk_index = excluded.chunk_index,
        text = excluded.text,
        start_offset = excluded.start_offset,
        end_offset = excluded.end_offset,
        previous_chunk_id = excluded.previous_chunk_id,
        next_chunk_id = excluded.next_chunk_id,
        vector = excluded.vector
    `);

    this.commit(() => {
      for (const record of records) {
        statement.run(toChunkParams(record));
      }
    });
  }

  async replaceDocument(document: IndexedDocument, records: IndexRecord[]): Promise<void> {
    validateRecords(this.modelInfo, records, document.id);

    const insertChunk = this.db.prepare<ChunkParams>(`
      INSERT INTO chunks (
        id, document_id, document_name, source_path, chunk_index, text,
        start_offset, end_offset, previous_chunk_id, next_chunk_id, vector
      )
      VALUES (
        @id, @document_id, @document_name, @source_path, @chunk_index, @text,
        @start_offset, @end_offset, @previous_chunk_id, @next_chunk_id, @vector
      )
    `);
    const upsertDocument = this.db.prepare<DocumentRow>(`
      INSERT INTO documents (id, name, source_path, file_type, content_hash, chunk_count, ingested_at)
      VALUES (@id, @name, @source_path, @file_type, @content_hash, @chunk_count, @ingested_at)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        source_path = excluded.source_path,
        file_type = excluded.file_type,
        content_hash = excluded.content_hash,
        chunk_count = excluded.chunk_count,
        ingested_at = excluded.ingested_at
    `);

    this.commit(() => {
      this.db.prepare("DELETE FROM chunks WHERE document_id = ?").run(document.id);
      for (const record of records) {
        insertChunk.run(toChunkParams(record));
      }
      upsertDocument.run({
        id: document.id,
        name: document.name,
        source_path: document.sourcePath,
        file_type: document.fileType,
        content_hash: document.contentHash,
        chunk_count: records.length,
        ingested_at: document.ingestedAt.toISOString()
      });
    });
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    let changes = 0;
    this.commit(() => {
      changes += this.db.prepare("DELETE FROM chunks WHERE document_id = ?").run(documentId).changes;
      changes += this.db.prepare("DELETE FROM documents WHERE id = ?").run(documentId).changes;
    });
    return changes > 0;
  }

  async search(vector: number[], k: number): Promise<RetrievalResult> {
    const entries = this.loadSnapshot();
    if (entries.length === 0) {
      return [];
    }
    assertQueryVector(this.modelInfo, vector);
    return rankEntries(entries, vector, k);
  }

  async stats(): Promise<IndexStats> {
    const row = this.db
      .prepare<[], { chunk_count: number; document_count: number; character_count: number | null }>(
        `
        SELECT
          COUNT(*) AS chunk_count,
          COUNT(DISTINCT document_id) AS document_count,
          SUM(LENGTH(text)) AS character_count
        FROM chunks
        `
      )
      .get();

    return {
      documentCount: row?.document_count ?? 0,
      chunkCount: row?.chunk_count ?? 0,
      characterCount: row?.character_count ?? 0
    };
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    const rows = this.db
      .prepare<[], DocumentRow>(
        `
        SELECT id, name, source_path, file_type, content_hash, chunk_count, ingested_at
        FROM documents
        ORDER BY source_path ASC
        `
      )
      .all();

    return rows.map((row) => mapDocumentRow(row));
  }

  async getDocument(documentId: string): Promise<IndexedDocument | null> {
    const row = this.db
      .prepare<[string], DocumentRow>(
        `
        SELECT id, name, source_path, file_type, content_hash, chunk_count, ingested_at
        FROM documents
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(documentId);

    return row ? mapDocumentRow(row) : null;
  }

  async getChunksByDocument(documentId: string): Promise<StoredChunk[]> {
    const rows = this.db
      .prepare<[string], ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM chunks WHERE document_id = ? ORDER BY chunk_index ASC`
      )
      .all(documentId);

    return rows.map((row) => ({ chunk: mapChunk(row), vector: decodeVector(row.vector) }));
  }

  async getModelInfo(): Promise<EmbeddingModelInfo | null> {
    return this.modelInfo ? { ...this.modelInfo } : null;
  }

  async assertCompatible(info: EmbeddingModelInfo): Promise<void> {
    if (!this.modelInfo) {
      this.commit(() => this.writeModelInfo(info));
      return;
    }
    assertModelMatches(this.modelInfo, info);
  }

  async reset(info: EmbeddingModelInfo | null): Promise<void> {
    this.commit(() => {
      this.db.exec("DELETE FROM chunks; DELETE FROM documents; DELETE FROM index_meta;");
      if (info) {
        this.writeModelInfo(info);
      }
    });
    this.modelInfo = info ? { ...info } : null;
  }

  async close(): Promise<void> {
    this.snapshot = null;
    this.db.close();
  }

  private commit(work: () => void): void {
    this.db.transaction(work)();
    this.snapshot = null;
  }

  private loadSnapshot(): SearchEntry[] {
    if (this.snapshot) {
      return this.snapshot;
    }

    const rows = this.db
      .prepare<[], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks ORDER BY seq ASC`)
      .all();
    const entries = rows.map((row) => ({
      chunk: mapChunk(row),
      vector: decodeVector(row.vector),
      document: { id: row.document_id, name: row.document_name, sourcePath: row.source_path },
      seq: row.seq
    }));

    this.snapshot = entries;
    return entries;
  }

  private readModelInfo(): EmbeddingModelInfo | null {
    const rows = this.db.prepare<[], MetaRow>("SELECT key, value FROM index_meta").all();
    const meta = new Map(rows.map((row) => [row.key, row.value]));
    const model = meta.get("embedding_model");
    const dimensions = Number(meta.get("dimensions"));
    if (!model || !Number.isInteger(dimensions) || dimensions <= 0) {
      return null;
    }
    return { model, dimensions };
  }

  private writeModelInfo(info: EmbeddingModelInfo): void {
    const statement = this.db.prepare<[string, string]>(
      "INSERT INTO index_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
    );
    statement.run("embedding_model", info.model);
    statement.run("dimensions", String(info.dimensions));
    this.modelInfo = { ...info };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS index_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        source_path TEXT NOT NULL,
        file_type TEXT NOT NULL CHECK(file_type IN ('pdf', 'md', 'txt')),
        content_hash TEXT NOT NULL,
        chunk_count INTEGER NOT NULL DEFAULT 0,
        ingested_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunks (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        document_id TEXT NOT NULL,
        document_name TEXT NOT NULL,
        source_path TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        text TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        previous_chunk_id TEXT,
        next_chunk_id TEXT,
        vector BLOB NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_chunks_document_id
        ON chunks(document_id, chunk_index);
    `);
  }
}

function toChunkParams(record: IndexRecord): ChunkParams {
  return {
    id: record.chunk.id,
    document_id: record.chunk.documentId,
    document_name: record.document.name,
    source_path: record.document.sourcePath,
    chunk_index: record.chunk.index,
    text: record.chunk.text,
    start_offset: record.chunk.start,
    end_offset: record.chunk.end,
    previous_chunk_id: record.chunk.previousChunkId,
    next_chunk_id: record.chunk.nextChunkId,
    vector: encodeVector(record.vector)
  };
}

function mapChunk(row: ChunkRow): DocumentChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    text: row.text,
    start: row.start_offset,
    end: row.end_offset,
    previousChunkId: row.previous_chunk_id,
    nextChunkId: row.next_chunk_id
  };
}

function mapDocumentRow(row: DocumentRow): IndexedDocument {
  return {
    id: row.id,
    name: row.name,
    sourcePath: row.source_path,
    fileType: row.file_type,
    contentHash: row.content_hash,
    chunkCount: row.chunk_count,
    ingestedAt: new Date(row.ingested_at)
  };
}

// float64 keeps stored vectors bit-identical to what the embedding service returned
export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * 8);
  vector.forEach((value, index) => {
    buffer.writeDoubleLE(value, index * 8);
  });
  return buffer;
}

export function decodeVector(buffer: Buffer): number[] {
  const vector: number[] = new Array<number>(buffer.length / 8);
  for (let index = 0; index < vector.length; index += 1) {
    vector[index] = buffer.readDoubleLE(index * 8);
  }
  return vector;
}
