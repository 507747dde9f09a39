/**
 * In-memory Vector Store
 *
 * Linear-scan cosine similarity over a Map keyed by chunk id. Each stored
 * chunk is a private copy set in a single Map write, so a concurrent search
 * sees either the old chunk or the new one, never a mix. `replace` builds
 * the next Map aside and swaps it in whole.
 */

import type {
  VectorStore,
  VectorStoreStats,
  RunbookChunk,
  RetrievedChunk,
  ChunkFilter,
} from "../types";
import { assertSourcePath, rankChunks } from "./similarity";

export interface MemoryStoreConfig {
  /** Expected embedding dimension; chunks of another size are rejected */
  dimension?: number;
}

function copyChunk(chunk: RunbookChunk): RunbookChunk {
  return {
    ...chunk,
    embedding: [...chunk.embedding],
    metadata: {
      ...chunk.metadata,
      tags: [...chunk.metadata.tags],
      applicableShapes: [...chunk.metadata.applicableShapes],
    },
  };
}

export class InMemoryVectorStore implements VectorStore {
  readonly name: string = "memory";

  private chunks = new Map<string, RunbookChunk>();
  private dimension?: number;

  constructor(config: MemoryStoreConfig = {}) {
    this.dimension = config.dimension;
  }

  async initialize(): Promise<void> {}

  async store(chunk: RunbookChunk): Promise<void> {
    await this.storeBatch([chunk]);
  }

  async storeBatch(chunks: RunbookChunk[]): Promise<void> {
    const copies = chunks.map((chunk) => {
      this.validate(chunk);
      return copyChunk(chunk);
    });

    for (const chunk of copies) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  async search(
    embedding: number[],
    k: number,
    filter?: ChunkFilter
  ): Promise<RetrievedChunk[]> {
    return rankChunks(this.chunks.values(), embedding, k, filter);
  }

  async delete(sourcePath: string): Promise<number> {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.sourcePath === sourcePath) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async replace(sourcePath: string, chunks: RunbookChunk[]): Promise<number> {
    const copies = chunks.map((chunk) => {
      assertSourcePath(chunk, sourcePath);
      this.validate(chunk);
      return copyChunk(chunk);
    });

    const next = new Map<string, RunbookChunk>();
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.sourcePath === sourcePath) {
        removed++;
      } else {
        next.set(id, chunk);
      }
    }
    for (const chunk of copies) {
      next.set(chunk.id, chunk);
    }

    this.chunks = next;
    return removed;
  }

  async clear(): Promise<void> {
    this.chunks.clear();
  }

  async stats(): Promise<VectorStoreStats> {
    const documents = new Set<string>();
    for (const chunk of this.chunks.values()) {
      documents.add(chunk.sourcePath);
    }
    return {
      totalChunks: this.chunks.size,
      totalDocuments: documents.size,
    };
  }

  /**
   * All stored chunks, ordered by id
   */
  snapshot(): RunbookChunk[] {
    return [...this.chunks.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  private validate(chunk: RunbookChunk): void {
    if (chunk.embedding.length === 0) {
      throw new Error(`Chunk ${chunk.id} has no embedding`);
    }
    if (this.dimension !== undefined && chunk.embedding.length !== this.dimension) {
      throw new Error(
        `Chunk ${chunk.id} embedding dimension ${chunk.embedding.length} does not match ${this.dimension}`
      );
    }
  }
}

/**
 * Create in-memory vector store
 */
export function createMemoryStore(config?: MemoryStoreConfig): VectorStore {
  return new InMemoryVectorStore(config);
}
