/**
 * PostgreSQL Vector Store (pgvector)
 *
 * Durable backend using the `vector` column type and cosine distance (`<=>`).
 * Scores are `1 - distance` and rows are ordered by score then id (byte
 * order), matching the in-memory ranking.
 */

import pg from "pg";
import { z } from "zod";
import type {
  VectorStore,
  VectorStoreStats,
  RunbookChunk,
  RetrievedChunk,
  ChunkFilter,
} from "../types";
import { assertSourcePath, assertValidK } from "./similarity";

const { Pool } = pg;

export interface QueryRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * A client checked out of the pool, used for transactions
 */
export interface PooledClient extends QueryRunner {
  release(err?: Error | boolean): void;
}

/**
 * The subset of pg.Pool this store needs
 */
export interface Queryable extends QueryRunner {
  connect(): Promise<PooledClient>;
}

interface Statement {
  text: string;
  values: unknown[];
}

export interface PgStoreConfig {
  /** Connection string, used when no pool is given */
  connectionString?: string;
  /** Existing pool */
  pool?: Queryable;
  /** Embedding dimension of the vector column */
  dimension: number;
  /** Table name (default: runbook_chunks) */
  tableName?: string;
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

const ChunkRowSchema = z.object({
  id: z.string(),
  source_path: z.string(),
  section_title: z.string(),
  content: z.string(),
  chunk_index: z.coerce.number().int(),
  title: z.string().nullable(),
  tags: z.array(z.string()),
  applicable_shapes: z.array(z.string()),
  embedding: z.string(),
  score: z.coerce.number(),
});

const StatsRowSchema = z.object({
  total_chunks: z.coerce.number(),
  total_documents: z.coerce.number(),
});

type ChunkRow = z.infer<typeof ChunkRowSchema>;

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

function parseVectorLiteral(literal: string): number[] {
  return z.array(z.number()).parse(JSON.parse(literal));
}

function rowToRetrieved(row: ChunkRow): RetrievedChunk {
  const chunk: RunbookChunk = {
    id: row.id,
    sourcePath: row.source_path,
    sectionTitle: row.section_title,
    content: row.content,
    chunkIndex: row.chunk_index,
    metadata: {
      tags: row.tags,
      applicableShapes: row.applicable_shapes,
    },
    embedding: parseVectorLiteral(row.embedding),
  };
  if (row.title !== null) {
    chunk.metadata.title = row.title;
  }
  return { chunk, similarity: row.score, score: row.score };
}

export class PgVectorStore implements VectorStore {
  readonly name = "pg";

  private pool: Queryable;
  private dimension: number;
  private table: string;
  private initialized = false;

  constructor(config: PgStoreConfig) {
    const tableName = config.tableName ?? "runbook_chunks";
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid table name: ${tableName}`);
    }
    if (!Number.isInteger(config.dimension) || config.dimension < 1) {
      throw new Error(`Invalid embedding dimension: ${config.dimension}`);
    }

    if (config.pool) {
      this.pool = config.pool;
    } else if (config.connectionString) {
      this.pool = new Pool({ connectionString: config.connectionString, max: 5 });
    } else {
      throw new Error("PgVectorStore requires a pool or a connectionString");
    }

    this.dimension = config.dimension;
    this.table = tableName;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.pool.query("CREATE EXTENSION IF NOT EXISTS vector");
    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        id TEXT PRIMARY KEY,
        source_path TEXT NOT NULL,
        section_title TEXT NOT NULL,
        content TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        title TEXT,
        tags TEXT[] NOT NULL DEFAULT '{}',
        applicable_shapes TEXT[] NOT NULL DEFAULT '{}',
        embedding vector(${this.dimension}) NOT NULL
      )`
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${this.table}_source_path_idx ON ${this.table} (source_path)`
    );

    this.initialized = true;
    console.log(`[PgVectorStore] Initialized table ${this.table} (dimension ${this.dimension})`);
  }

  async store(chunk: RunbookChunk): Promise<void> {
    await this.storeBatch([chunk]);
  }

  /**
   * Upsert all chunks in one statement, so they become visible together
   */
  async storeBatch(chunks: RunbookChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const upsert = this.buildUpsert(chunks);
    await this.initialize();
    await this.pool.query(upsert.text, upsert.values);
  }

  /**
   * DELETE and INSERT in one transaction on a single pooled client
   */
  async replace(sourcePath: string, chunks: RunbookChunk[]): Promise<number> {
    for (const chunk of chunks) {
      assertSourcePath(chunk, sourcePath);
    }
    const upsert = chunks.length > 0 ? this.buildUpsert(chunks) : null;
    await this.initialize();

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const deleted = await client.query(`DELETE FROM ${this.table} WHERE source_path = $1`, [
        sourcePath,
      ]);
      if (upsert) {
        await client.query(upsert.text, upsert.values);
      }
      await client.query("COMMIT");
      return deleted.rowCount ?? 0;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        console.error(`[PgVectorStore] Rollback failed for ${sourcePath}:`, rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  private buildUpsert(chunks: RunbookChunk[]): Statement {
    const values: unknown[] = [];
    const rows = chunks.map((chunk) => {
      if (chunk.embedding.length !== this.dimension) {
        throw new Error(
          `Chunk ${chunk.id} embedding dimension ${chunk.embedding.length} does not match ${this.dimension}`
        );
      }
      const base = values.length;
      values.push(
        chunk.id,
        chunk.sourcePath,
        chunk.sectionTitle,
        chunk.content,
        chunk.chunkIndex,
        chunk.metadata.title ?? null,
        chunk.metadata.tags,
        chunk.metadata.applicableShapes,
        toVectorLiteral(chunk.embedding)
      );
      const placeholders = Array.from({ length: 9 }, (_, i) => `$${base + i + 1}`);
      placeholders[8] = `${placeholders[8]}::vector`;
      return `(${placeholders.join(", ")})`;
    });

    return {
      text: `INSERT INTO ${this.table}
        (id, source_path, section_title, content, chunk_index, title, tags, applicable_shapes, embedding)
      VALUES ${rows.join(", ")}
      ON CONFLICT (id) DO UPDATE SET
        source_path = EXCLUDED.source_path,
        section_title = EXCLUDED.section_title,
        content = EXCLUDED.content,
        chunk_index = EXCLUDED.chunk_index,
        title = EXCLUDED.title,
        tags = EXCLUDED.tags,
        applicable_shapes = EXCLUDED.applicable_shapes,
        embedding = EXCLUDED.embedding`,
      values,
    };
  }

  async search(
    embedding: number[],
    k: number,
    filter?: ChunkFilter
  ): Promise<RetrievedChunk[]> {
    assertValidK(k);
    if (embedding.length !== this.dimension) {
      return [];
    }
    await this.initialize();

    const values: unknown[] = [toVectorLiteral(embedding)];
    const conditions: string[] = [];

    if (filter?.shape) {
      values.push(filter.shape);
      // Glob "*" becomes LIKE "%"; LIKE metacharacters in patterns are escaped
      conditions.push(
        `(cardinality(applicable_shapes) = 0 OR EXISTS (
          SELECT 1 FROM unnest(applicable_shapes) AS pattern
          WHERE lower(pattern) IN ('*', 'all')
             OR $${values.length} ILIKE replace(replace(replace(replace(pattern, '\\', '\\\\'), '%', '\\%'), '_', '\\_'), '*', '%')
        ))`
      );
    }

    if (filter?.tags && filter.tags.length > 0) {
      values.push(filter.tags.map((tag) => tag.toLowerCase()));
      conditions.push(
        `EXISTS (SELECT 1 FROM unnest(tags) AS tag WHERE lower(tag) = ANY($${values.length}::text[]))`
      );
    }

    values.push(k);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    const result = await this.pool.query(
      `SELECT id, source_path, section_title, content, chunk_index, title, tags, applicable_shapes,
        embedding::text AS embedding,
        1 - (embedding <=> $1::vector) AS score
      FROM ${this.table}
      ${where}
      ORDER BY score DESC, id COLLATE "C" ASC
      LIMIT $${values.length}`,
      values
    );

    return result.rows.map((row) => rowToRetrieved(ChunkRowSchema.parse(row)));
  }

  async delete(sourcePath: string): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(
      `DELETE FROM ${this.table} WHERE source_path = $1`,
      [sourcePath]
    );
    return result.rowCount ?? 0;
  }

  async clear(): Promise<void> {
    await this.initialize();
    await this.pool.query(`DELETE FROM ${this.table}`);
    console.log(`[PgVectorStore] Cleared ${this.table}`);
  }

  async stats(): Promise<VectorStoreStats> {
    await this.initialize();
    const result = await this.pool.query(
      `SELECT count(*) AS total_chunks, count(DISTINCT source_path) AS total_documents FROM ${this.table}`
    );
    const row = StatsRowSchema.parse(result.rows[0]);
    return {
      totalChunks: row.total_chunks,
      totalDocuments: row.total_documents,
    };
  }
}

/**
 * Create pgvector store
 */
export function createPgStore(config: PgStoreConfig): VectorStore {
  return new PgVectorStore(config);
}
