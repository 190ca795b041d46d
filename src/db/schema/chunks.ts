/**
 * Chunk Collection Schema (Drizzle ORM)
 *
 * One table per vector collection, one row per indexed chunk.
 * The table is created at runtime by PgVectorStore.ensureCollection(),
 * so the column list here must match the DDL in createChunkTableSql().
 */

import { sql, SQL } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  index,
  customType,
} from 'drizzle-orm/pg-core';

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * Custom type for pgvector embeddings.
 * Stores vectors as float arrays, serializes to/from pgvector format.
 */
export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return config ? `vector(${config.dimensions})` : 'vector';
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: string): number[] {
    // Parse pgvector format: [0.1,0.2,0.3,...]
    return value
      .slice(1, -1)
      .split(',')
      .map(Number);
  },
});

export function toVectorLiteral(value: number[]): string {
  return `[${value.join(',')}]`;
}

// =============================================================================
// Chunk Table
// =============================================================================

/**
 * Table definition for a named collection.
 */
export function createChunkTable(name: string) {
  return pgTable(
    name,
    {
      id: uuid('id').primaryKey().defaultRandom(),
      content: text('content').notNull(),
      embedding: vector('embedding').notNull(),

      // Payload
      docId: varchar('doc_id', { length: 600 }).notNull(),
      title: varchar('title', { length: 500 }).notNull(),
      section: text('section').notNull().default(''),
      page: integer('page').notNull(),
      sourcePath: text('source_path').notNull(),
      chunkIndex: integer('chunk_index').notNull(),
    },
    (table) => ({
      docIdIdx: index(`idx_${name}_doc_id`).on(table.docId),
      titleIdx: index(`idx_${name}_title`).on(table.title),
    })
  );
}

export type ChunkTable = ReturnType<typeof createChunkTable>;
export type ChunkRow = ChunkTable['$inferSelect'];
export type NewChunkRow = ChunkTable['$inferInsert'];

/**
 * CREATE TABLE statement for a collection with a fixed vector dimension.
 */
export function createChunkTableSql(name: string, dimensions: number): SQL {
  const table = sql.identifier(name);
  return sql`
    CREATE TABLE IF NOT EXISTS ${table} (
      id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
      content text NOT NULL,
      embedding vector(${sql.raw(String(dimensions))}) NOT NULL,
      doc_id varchar(600) NOT NULL,
      title varchar(500) NOT NULL,
      section text NOT NULL DEFAULT '',
      page integer NOT NULL,
      source_path text NOT NULL,
      chunk_index integer NOT NULL
    )
  `;
}

export function createChunkIndexesSql(name: string): SQL[] {
  const table = sql.identifier(name);
  return [
    sql`CREATE INDEX IF NOT EXISTS ${sql.identifier(`idx_${name}_doc_id`)} ON ${table} (doc_id)`,
    sql`CREATE INDEX IF NOT EXISTS ${sql.identifier(`idx_${name}_title`)} ON ${table} (title)`,
  ];
}
