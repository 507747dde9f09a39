/**
 * RAG (Retrieval Augmented Generation) Types
 *
 * Defines the runbook chunk model, the vector store contract and the
 * embedding port used by ingestion and retrieval.
 */

/**
 * Frontmatter metadata carried by every chunk of a runbook
 */
export interface RunbookMetadata {
  /** Title from the frontmatter block */
  title?: string;
  /** Semantic tags, e.g. "memory", "oom" */
  tags: string[];
  /** Resource shape patterns the runbook applies to ("*" or globs) */
  applicableShapes: string[];
}

/**
 * A raw runbook document as read from storage
 */
export interface RunbookDocument {
  /** Storage path, e.g. "runbooks/memory/high-memory.md" */
  path: string;
  /** Raw markdown content */
  content: string;
}

/**
 * A chunk produced by the chunker, before embedding
 */
export interface ParsedChunk {
  /** Stable id derived from source path and chunk index */
  id: string;
  /** Path of the runbook this chunk came from */
  sourcePath: string;
  /** Header text of the section the chunk belongs to */
  sectionTitle: string;
  /** Chunk text */
  content: string;
  /** Position within the document, starting at 0 */
  chunkIndex: number;
  /** Document frontmatter */
  metadata: RunbookMetadata;
}

/**
 * An indexed chunk with its embedding
 */
export interface RunbookChunk extends ParsedChunk {
  embedding: number[];
}

/**
 * Candidate restriction applied before ranking
 */
export interface ChunkFilter {
  /** Resource shape; chunks without applicable shapes always pass */
  shape?: string;
  /** Chunk must share at least one tag */
  tags?: string[];
}

/**
 * A chunk plus its relevance for one query
 */
export interface RetrievedChunk {
  chunk: RunbookChunk;
  /** Cosine similarity between query and chunk embedding */
  similarity: number;
  /** Ranking score (similarity plus any metadata boost), higher is more relevant */
  score: number;
}

/**
 * Vector store interface - abstracts the underlying storage
 */
export interface VectorStore {
  /** Store name for identification */
  name: string;

  /** Initialize the store */
  initialize(): Promise<void>;

  /** Insert or replace a chunk by id */
  store(chunk: RunbookChunk): Promise<void>;

  /** Insert or replace several chunks */
  storeBatch(chunks: RunbookChunk[]): Promise<void>;

  /**
   * Up to k chunks by descending cosine similarity, ties by id ascending.
   * Chunks without an embedding are never returned.
   */
  search(embedding: number[], k: number, filter?: ChunkFilter): Promise<RetrievedChunk[]>;

  /** Remove all chunks of a source path; returns the number removed */
  delete(sourcePath: string): Promise<number>;

  /**
   * Swap every chunk of a source path for a new set in one step. On
   * failure the old chunks stay. Returns the number of old chunks removed.
   */
  replace(sourcePath: string, chunks: RunbookChunk[]): Promise<number>;

  /** Clear all chunks */
  clear(): Promise<void>;

  /** Get store statistics */
  stats(): Promise<VectorStoreStats>;
}

/**
 * Vector store statistics
 */
export interface VectorStoreStats {
  /** Total number of chunks */
  totalChunks: number;
  /** Total number of distinct source paths */
  totalDocuments: number;
  /** Storage size in bytes (if available) */
  sizeBytes?: number;
}

/**
 * Embedding provider interface
 */
export interface EmbeddingProvider {
  /** Provider name */
  name: string;
  /** Embedding dimension */
  dimension: number;

  /** Generate embedding for a single text */
  embed(text: string): Promise<number[]>;
}

/**
 * Document chunking options
 */
export interface ChunkingOptions {
  /** Maximum chunk size in characters */
  maxChunkSize?: number;
}
