/**
 * Vector Stores
 *
 * Export all vector store implementations and factory function.
 */

export * from "./similarity";
export * from "./memory-store";
export * from "./file-store";
export * from "./pg-store";

import type { VectorStore } from "../types";
import { createMemoryStore } from "./memory-store";
import { createFileStore, type FileStoreConfig } from "./file-store";
import { createPgStore, type PgStoreConfig } from "./pg-store";

export type VectorStoreType = "memory" | "file" | "pg";

export interface CreateVectorStoreOptions {
  type: VectorStoreType;
  /** Embedding dimension every stored chunk must have */
  dimension: number;
  file?: Omit<FileStoreConfig, "dimension">;
  pg?: Omit<PgStoreConfig, "dimension">;
}

/**
 * Create a vector store based on configuration
 */
export function createVectorStore(options: CreateVectorStoreOptions): VectorStore {
  switch (options.type) {
    case "pg":
      return createPgStore({ ...options.pg, dimension: options.dimension });
    case "file":
      return createFileStore({ ...options.file, dimension: options.dimension });
    case "memory":
      return createMemoryStore({ dimension: options.dimension });
  }
}
