/**
 * Ollama Embedding Provider
 *
 * Uses local Ollama instance for generating embeddings.
 * Great for development - no API costs.
 */

import { z } from "zod";
import type { EmbeddingProvider } from "../types";
import { ensureOk } from "../../utils/retry";

export interface OllamaEmbeddingConfig {
  /** Ollama base URL */
  baseUrl?: string;
  /** Model to use for embeddings */
  model?: string;
  /** Override the dimension inferred from the model name */
  dimension?: number;
}

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

/**
 * Get embedding dimension for common models
 */
export function getOllamaModelDimension(model: string): number {
  const dimensions: Record<string, number> = {
    "nomic-embed-text": 768,
    "mxbai-embed-large": 1024,
    "all-minilm": 384,
    "snowflake-arctic-embed": 1024,
  };

  // Default to nomic-embed-text dimension
  return dimensions[model.split(":")[0]] || 768;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = "ollama";
  readonly dimension: number;

  private baseUrl: string;
  private model: string;

  constructor(config: OllamaEmbeddingConfig = {}) {
    this.baseUrl = (config.baseUrl || "http://localhost:11434").replace(/\/+$/, "");
    this.model = config.model || "nomic-embed-text";
    this.dimension = config.dimension ?? getOllamaModelDimension(this.model);
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    await ensureOk(response, "Ollama embedding");

    const result = OllamaEmbeddingResponseSchema.parse(await response.json());
    if (result.embedding.length !== this.dimension) {
      throw new Error(
        `Ollama model ${this.model} returned ${result.embedding.length} dimensions, expected ${this.dimension}`
      );
    }
    return result.embedding;
  }
}

/**
 * Create Ollama embedding provider
 */
export function createOllamaEmbedding(config?: OllamaEmbeddingConfig): EmbeddingProvider {
  return new OllamaEmbeddingProvider(config);
}
