/**
 * Runbook Retriever
 *
 * Embeds a query built from the alert and its context, searches the vector
 * store and re-ranks candidates with a metadata boost. Any failure (embedding
 * unavailable, store error) yields an empty result so generation can proceed.
 */

import type { Alert } from "../types/alert";
import type { EnrichedContext } from "../types/context";
import { errorMessage } from "../types/errors";
import { withTimeout } from "../utils/timeout";
import { compareRetrieved, matchesShape } from "./stores/similarity";
import type { ChunkFilter, EmbeddingProvider, RetrievedChunk, VectorStore } from "./types";

export const TAG_BOOST = 0.1;
export const MAX_TAG_BOOST = 0.3;
export const SHAPE_BOOST = 0.2;

export interface RetrieverConfig {
  embeddings: EmbeddingProvider;
  store: VectorStore;
  /** Query embedding timeout (default: 15000) */
  embeddingTimeoutMs?: number;
  /** Candidates fetched per requested result (default: 2) */
  overFetchFactor?: number;
}

/**
 * Text embedded for the query: alert title and message, then the resource
 * name, shape and tags when known
 */
export function buildQueryText(alert: Alert, context: EnrichedContext): string {
  const parts = [alert.title, alert.message];

  const resource = context.resource;
  if (resource) {
    parts.push(`Resource: ${resource.displayName}`);
    if (resource.shape) {
      parts.push(`Shape: ${resource.shape}`);
    }
    const tags = Object.entries(resource.tags)
      .filter(([key]) => key !== "Name")
      .map(([key, value]) => `${key}=${value}`);
    if (tags.length > 0) {
      parts.push(`Tags: ${tags.join(", ")}`);
    }
  }

  return parts.filter((part) => part.trim()).join("\n");
}

/**
 * Boost from runbook frontmatter: each tag that appears as an alert
 * dimension or label key, or inside the alert title, adds TAG_BOOST (capped);
 * a shape pattern matching the resource shape adds SHAPE_BOOST.
 */
export function metadataBoost(candidate: RetrievedChunk, context: EnrichedContext): number {
  const { alert, resource } = context;
  const metadata = candidate.chunk.metadata;

  const keys = new Set(
    [...Object.keys(alert.dimensions), ...Object.keys(alert.labels)].map((key) =>
      key.toLowerCase()
    )
  );
  const title = alert.title.toLowerCase();

  let tagBoost = 0;
  for (const tag of metadata.tags) {
    const normalized = tag.toLowerCase();
    if (keys.has(normalized) || title.includes(normalized)) {
      tagBoost += TAG_BOOST;
    }
  }

  let boost = Math.min(tagBoost, MAX_TAG_BOOST);

  const shape = resource?.shape;
  if (shape && metadata.applicableShapes.some((pattern) => matchesShape(pattern, shape))) {
    boost += SHAPE_BOOST;
  }

  return boost;
}

export class RunbookRetriever {
  private embeddings: EmbeddingProvider;
  private store: VectorStore;
  private embeddingTimeoutMs: number;
  private overFetchFactor: number;

  constructor(config: RetrieverConfig) {
    this.embeddings = config.embeddings;
    this.store = config.store;
    this.embeddingTimeoutMs = config.embeddingTimeoutMs ?? 15000;
    this.overFetchFactor = Math.max(1, config.overFetchFactor ?? 2);
  }

  async retrieve(alert: Alert, context: EnrichedContext, k: number): Promise<RetrievedChunk[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }

    try {
      const embedding = await withTimeout(
        this.embeddings.embed(buildQueryText(alert, context)),
        this.embeddingTimeoutMs,
        `Query embedding timed out after ${this.embeddingTimeoutMs}ms`
      );

      const filter: ChunkFilter = {};
      if (context.resource?.shape) {
        filter.shape = context.resource.shape;
      }

      const candidates = await this.store.search(embedding, k * this.overFetchFactor, filter);

      const ranked = candidates
        .map((candidate) => ({
          ...candidate,
          score: candidate.similarity + metadataBoost(candidate, context),
        }))
        .sort(compareRetrieved)
        .slice(0, k);

      console.log(`[Retriever] Alert ${alert.id}: ${ranked.length} chunks retrieved`);
      return ranked;
    } catch (error) {
      console.warn(
        `[Retriever] Retrieval unavailable for alert ${alert.id}, continuing without runbooks: ${errorMessage(error)}`
      );
      return [];
    }
  }
}
