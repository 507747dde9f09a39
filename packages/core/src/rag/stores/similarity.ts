/**
 * Ranking shared by every vector store backend so that call sites see the
 * same order regardless of where chunks live.
 */

import type { ChunkFilter, RetrievedChunk, RunbookChunk, RunbookMetadata } from "../types";

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

/**
 * Match a resource shape against a frontmatter pattern.
 * "*" and "all" match everything; "*" inside a pattern is a wildcard.
 */
export function matchesShape(pattern: string, shape: string): boolean {
  const trimmed = pattern.trim();
  if (trimmed === "*" || trimmed.toLowerCase() === "all") {
    return true;
  }

  const regex = trimmed
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");

  return new RegExp(`^${regex}$`, "i").test(shape);
}

/**
 * Check if chunk metadata passes a filter
 */
export function matchesFilter(metadata: RunbookMetadata, filter?: ChunkFilter): boolean {
  if (!filter) {
    return true;
  }

  if (filter.shape && metadata.applicableShapes.length > 0) {
    const shape = filter.shape;
    if (!metadata.applicableShapes.some((pattern) => matchesShape(pattern, shape))) {
      return false;
    }
  }

  if (filter.tags && filter.tags.length > 0) {
    const wanted = new Set(filter.tags.map((tag) => tag.toLowerCase()));
    if (!metadata.tags.some((tag) => wanted.has(tag.toLowerCase()))) {
      return false;
    }
  }

  return true;
}

/**
 * Descending score, then ascending id
 */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

export function assertSourcePath(chunk: RunbookChunk, sourcePath: string): void {
  if (chunk.sourcePath !== sourcePath) {
    throw new Error(`Chunk ${chunk.id} belongs to ${chunk.sourcePath}, not ${sourcePath}`);
  }
}

export function assertValidK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
}

/**
 * Linear-scan ranking over a set of chunks
 */
export function rankChunks(
  chunks: Iterable<RunbookChunk>,
  embedding: number[],
  k: number,
  filter?: ChunkFilter
): RetrievedChunk[] {
  assertValidK(k);

  const results: RetrievedChunk[] = [];

  for (const chunk of chunks) {
    if (chunk.embedding.length === 0 || chunk.embedding.length !== embedding.length) {
      continue;
    }
    if (!matchesFilter(chunk.metadata, filter)) {
      continue;
    }

    const similarity = cosineSimilarity(embedding, chunk.embedding);
    results.push({ chunk, similarity, score: similarity });
  }

  return results.sort(compareRetrieved).slice(0, k);
}
