/**
 * Vector Index
 *
 * Persists (vector, text, metadata) tuples and serves filtered
 * nearest-neighbour search by cosine similarity:
 * - PgVectorStore: pgvector table through drizzle
 * - InMemoryVectorStore: process-local, for tests and offline runs
 */

import { randomUUID } from 'crypto';
import { and, count, eq, sql, SQL } from 'drizzle-orm';
import {
  createChunkIndexesSql,
  createChunkTable,
  createChunkTableSql,
  toVectorLiteral,
  type ChunkTable,
  type Database,
  type NewChunkRow,
  getDb,
} from '@/db';
import { BatchLengthMismatchError, ConfigurationError, VectorStoreError, toErrorMessage } from '@/lib/errors';
import { loggers, logDbOperation } from '@/lib/logger';
import type { Settings } from '@/lib/config';
import { RECOGNIZED_FILTER_KEYS } from './config';

const log = loggers.db.child({ service: 'VectorStore' });

// =============================================================================
// Types
// =============================================================================

/**
 * Payload stored with every vector.
 */
export interface ChunkMetadata {
  /** "{title}_{pageIndex}" */
  docId: string;
  title: string;
  section: string;
  page: number;
  sourcePath: string;
  chunkIndex: number;
}

export interface IndexedDocument extends ChunkMetadata {
  id: string;
  vector: number[];
  text: string;
}

export interface RetrievedPassage extends ChunkMetadata {
  id: string;
  text: string;
  /** Cosine similarity to the query vector */
  score: number;
  rerankScore?: number;
}

/**
 * Raw filter map as callers pass it; unknown keys are dropped.
 */
export type SearchFilters = Record<string, unknown>;

export interface NormalizedFilters {
  /** Exact match on title */
  product?: string;
  /** Exact match on docId */
  docId?: string;
}

export interface VectorStore {
  readonly name: string;
  /** Create the collection if absent. Idempotent. */
  ensureCollection(dimension: number): Promise<void>;
  /** @throws BatchLengthMismatchError when the three inputs differ in length */
  upsert(texts: string[], vectors: number[][], metadata: ChunkMetadata[]): Promise<number>;
  search(vector: number[], k: number, filters?: SearchFilters): Promise<RetrievedPassage[]>;
  count(): Promise<number>;
  drop(): Promise<void>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Keep the recognized string-valued filter keys.
 */
export function normalizeFilters(filters?: SearchFilters): NormalizedFilters {
  const result: NormalizedFilters = {};
  if (!filters) return result;

  for (const key of RECOGNIZED_FILTER_KEYS) {
    const value = filters[key];
    if (typeof value !== 'string' || value === '') continue;
    if (key === 'product') result.product = value;
    else result.docId = value;
  }

  return result;
}

export function assertBatchLengths(
  texts: string[],
  vectors: number[][],
  metadata: ChunkMetadata[]
): void {
  if (texts.length !== vectors.length || texts.length !== metadata.length) {
    throw new BatchLengthMismatchError({
      texts: texts.length,
      vectors: vectors.length,
      metadata: metadata.length,
    });
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// =============================================================================
// pgvector
// =============================================================================

const INSERT_BATCH_SIZE = 500;

export class PgVectorStore implements VectorStore {
  readonly name = 'pgvector';
  private table: ChunkTable;
  private ensured = false;

  constructor(
    private readonly db: Database,
    private readonly collection: string
  ) {
    this.table = createChunkTable(collection);
  }

  async ensureCollection(dimension: number): Promise<void> {
    if (this.ensured) return;
    const start = Date.now();
    let existing: number | null;

    try {
      await this.db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);
      await this.db.execute(createChunkTableSql(this.collection, dimension));
      for (const statement of createChunkIndexesSql(this.collection)) {
        await this.db.execute(statement);
      }
      existing = await this.existingDimension();
    } catch (error) {
      logDbOperation(log, 'ensure_collection', {
        table: this.collection,
        duration_ms: Date.now() - start,
        error: toErrorMessage(error),
      });
      throw new VectorStoreError('ensure_collection', error);
    }

    if (existing !== null && existing !== dimension) {
      throw new ConfigurationError(
        `Collection ${this.collection} stores ${existing}-dimension vectors, ` +
          `but the embedding provider produces ${dimension}`
      );
    }

    this.ensured = true;
    logDbOperation(log, 'ensure_collection', {
      table: this.collection,
      duration_ms: Date.now() - start,
    });
  }

  /**
   * pgvector stores the declared dimension as the column's type modifier.
   */
  private async existingDimension(): Promise<number | null> {
    const rows = await this.db.execute(sql`
      SELECT atttypmod AS dimension
      FROM pg_attribute
      WHERE attrelid = to_regclass(${this.collection})
        AND attname = 'embedding'
    `);
    const [row] = Array.from(rows);
    if (!row) return null;
    const dimension = Number(row.dimension);
    return Number.isFinite(dimension) && dimension > 0 ? dimension : null;
  }

  async upsert(texts: string[], vectors: number[][], metadata: ChunkMetadata[]): Promise<number> {
    assertBatchLengths(texts, vectors, metadata);
    if (texts.length === 0) return 0;

    const rows: NewChunkRow[] = texts.map((content, i) => ({
      content,
      embedding: vectors[i],
      ...metadata[i],
    }));

    const start = Date.now();
    try {
      // One transaction so a search never sees half of a batch
      await this.db.transaction(async (tx) => {
        for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
          await tx.insert(this.table).values(rows.slice(i, i + INSERT_BATCH_SIZE));
        }
      });
    } catch (error) {
      logDbOperation(log, 'upsert', {
        table: this.collection,
        rows: rows.length,
        duration_ms: Date.now() - start,
        error: toErrorMessage(error),
      });
      throw new VectorStoreError('upsert', error);
    }

    logDbOperation(log, 'upsert', {
      table: this.collection,
      rows: rows.length,
      duration_ms: Date.now() - start,
    });
    return rows.length;
  }

  async search(vector: number[], k: number, filters?: SearchFilters): Promise<RetrievedPassage[]> {
    const { product, docId } = normalizeFilters(filters);
    const conditions: SQL[] = [];
    if (product) conditions.push(eq(this.table.title, product));
    if (docId) conditions.push(eq(this.table.docId, docId));

    const distance = sql`${this.table.embedding} <=> ${toVectorLiteral(vector)}::vector`;
    const start = Date.now();

    try {
      const rows = await this.db
        .select({
          id: this.table.id,
          text: this.table.content,
          docId: this.table.docId,
          title: this.table.title,
          section: this.table.section,
          page: this.table.page,
          sourcePath: this.table.sourcePath,
          chunkIndex: this.table.chunkIndex,
          score: sql<number>`1 - (${distance})`.mapWith(Number),
        })
        .from(this.table)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(distance)
        .limit(k);

      logDbOperation(log, 'search', {
        table: this.collection,
        rows: rows.length,
        duration_ms: Date.now() - start,
      });
      return rows;
    } catch (error) {
      logDbOperation(log, 'search', {
        table: this.collection,
        duration_ms: Date.now() - start,
        error: toErrorMessage(error),
      });
      throw new VectorStoreError('search', error);
    }
  }

  async count(): Promise<number> {
    try {
      const [row] = await this.db.select({ value: count() }).from(this.table);
      return row?.value ?? 0;
    } catch (error) {
      throw new VectorStoreError('count', error);
    }
  }

  async drop(): Promise<void> {
    try {
      await this.db.execute(sql`DROP TABLE IF EXISTS ${sql.identifier(this.collection)}`);
      this.ensured = false;
      log.info({ event: 'collection_dropped', table: this.collection }, 'Collection dropped');
    } catch (error) {
      throw new VectorStoreError('drop', error);
    }
  }
}

// =============================================================================
// In-Memory
// =============================================================================

/**
 * Upserts replace the document array instead of mutating it, so a search
 * iterates over a consistent snapshot.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private documents: readonly IndexedDocument[] = [];
  private dimension: number | null = null;

  async ensureCollection(dimension: number): Promise<void> {
    if (this.dimension === null) {
      this.dimension = dimension;
      return;
    }
    if (this.dimension !== dimension) {
      throw new ConfigurationError(
        `Collection stores ${this.dimension}-dimension vectors, ` +
          `but the embedding provider produces ${dimension}`
      );
    }
  }

  async upsert(texts: string[], vectors: number[][], metadata: ChunkMetadata[]): Promise<number> {
    assertBatchLengths(texts, vectors, metadata);

    const expected = this.dimension;
    if (expected !== null) {
      const bad = vectors.find((v) => v.length !== expected);
      if (bad) {
        throw new VectorStoreError(
          'upsert',
          new Error(`expected ${expected}-dimension vectors, got ${bad.length}`)
        );
      }
    }

    const added: IndexedDocument[] = texts.map((text, i) => ({
      id: randomUUID(),
      vector: vectors[i],
      text,
      ...metadata[i],
    }));
    this.documents = [...this.documents, ...added];
    return added.length;
  }

  async search(vector: number[], k: number, filters?: SearchFilters): Promise<RetrievedPassage[]> {
    const { product, docId } = normalizeFilters(filters);
    const snapshot = this.documents;

    return snapshot
      .filter((doc) => (!product || doc.title === product) && (!docId || doc.docId === docId))
      .map(({ vector: stored, ...doc }) => ({ ...doc, score: cosineSimilarity(vector, stored) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async count(): Promise<number> {
    return this.documents.length;
  }

  async drop(): Promise<void> {
    this.documents = [];
    this.dimension = null;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createVectorStore(settings: Settings): VectorStore {
  const { provider, databaseUrl, collection } = settings.vectorStore;
  if (provider === 'memory') {
    return new InMemoryVectorStore();
  }
  return new PgVectorStore(getDb(databaseUrl), collection);
}
