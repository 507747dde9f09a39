/**
 * File-based Vector Store
 *
 * Simple JSON file storage for local development.
 * Chunks live in memory for search; every mutation rewrites the index file
 * through a temp file + rename, one write at a time.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type {
  VectorStore,
  VectorStoreStats,
  RunbookChunk,
  RetrievedChunk,
  ChunkFilter,
} from "../types";
import { InMemoryVectorStore } from "./memory-store";

export interface FileStoreConfig {
  /** Directory to store the vector data */
  dataDir?: string;
  /** Filename for the index */
  indexFile?: string;
  /** Expected embedding dimension */
  dimension?: number;
}

const StoredChunkSchema = z.object({
  id: z.string(),
  sourcePath: z.string(),
  sectionTitle: z.string(),
  content: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  metadata: z.object({
    title: z.string().optional(),
    tags: z.array(z.string()),
    applicableShapes: z.array(z.string()),
  }),
  embedding: z.array(z.number()),
});

const StoredDataSchema = z.object({
  chunks: z.array(StoredChunkSchema),
  metadata: z.object({
    createdAt: z.string(),
    updatedAt: z.string(),
    version: z.number(),
  }),
});

type StoredData = z.infer<typeof StoredDataSchema>;

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileVectorStore implements VectorStore {
  readonly name = "file";

  private dataDir: string;
  private indexPath: string;
  private memory: InMemoryVectorStore;
  private createdAt = new Date().toISOString();
  private initialized = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(config: FileStoreConfig = {}) {
    this.dataDir = config.dataDir || path.join(process.cwd(), ".rag");
    const indexFile = config.indexFile || "vectors.json";
    this.indexPath = path.join(this.dataDir, indexFile);
    this.memory = new InMemoryVectorStore({ dimension: config.dimension });
  }

  /**
   * Initialize the store - load existing data or create new
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await fs.mkdir(this.dataDir, { recursive: true });

    try {
      const content = await fs.readFile(this.indexPath, "utf-8");
      const data = StoredDataSchema.parse(JSON.parse(content));
      this.createdAt = data.metadata.createdAt;
      await this.memory.storeBatch(data.chunks);
      console.log(`[FileVectorStore] Loaded ${data.chunks.length} chunks from ${this.indexPath}`);
    } catch (error) {
      if (!isNotFound(error)) {
        throw new Error(`Failed to load vector index ${this.indexPath}`, { cause: error });
      }
      console.log("[FileVectorStore] Initialized new empty store");
    }

    this.initialized = true;
  }

  async store(chunk: RunbookChunk): Promise<void> {
    await this.storeBatch([chunk]);
  }

  async storeBatch(chunks: RunbookChunk[]): Promise<void> {
    await this.initialize();
    await this.memory.storeBatch(chunks);
    await this.persist();
  }

  async search(
    embedding: number[],
    k: number,
    filter?: ChunkFilter
  ): Promise<RetrievedChunk[]> {
    await this.initialize();
    return this.memory.search(embedding, k, filter);
  }

  async delete(sourcePath: string): Promise<number> {
    await this.initialize();
    const removed = await this.memory.delete(sourcePath);

    if (removed > 0) {
      await this.persist();
      console.log(`[FileVectorStore] Removed ${removed} chunks for ${sourcePath}`);
    }
    return removed;
  }

  async replace(sourcePath: string, chunks: RunbookChunk[]): Promise<number> {
    await this.initialize();
    const removed = await this.memory.replace(sourcePath, chunks);
    await this.persist();
    return removed;
  }

  async clear(): Promise<void> {
    await this.initialize();
    await this.memory.clear();
    await this.persist();
    console.log("[FileVectorStore] Cleared all chunks");
  }

  async stats(): Promise<VectorStoreStats> {
    await this.initialize();
    const stats = await this.memory.stats();

    try {
      const stat = await fs.stat(this.indexPath);
      return { ...stats, sizeBytes: stat.size };
    } catch (error) {
      if (!isNotFound(error)) throw error;
      return stats;
    }
  }

  /**
   * Queue a write of the current snapshot. A failed write rejects for its
   * caller only; later writes still run.
   */
  private persist(): Promise<void> {
    const write = this.writeChain.then(() => this.save());
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async save(): Promise<void> {
    const data: StoredData = {
      chunks: this.memory.snapshot(),
      metadata: {
        createdAt: this.createdAt,
        updatedAt: new Date().toISOString(),
        version: 1,
      },
    };

    const tempPath = `${this.indexPath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2));
    await fs.rename(tempPath, this.indexPath);
  }
}

/**
 * Create file vector store
 */
export function createFileStore(config?: FileStoreConfig): VectorStore {
  return new FileVectorStore(config);
}
