/**
 * Embedding Providers
 *
 * Export all embedding providers and factory function.
 */

export * from "./ollama";
export * from "./bedrock";

import type { EmbeddingProvider } from "../types";
import { createOllamaEmbedding, type OllamaEmbeddingConfig } from "./ollama";
import { createBedrockEmbedding, type BedrockEmbeddingConfig } from "./bedrock";

export type EmbeddingProviderType = "ollama" | "bedrock";

export interface CreateEmbeddingProviderOptions {
  type: EmbeddingProviderType;
  ollama?: OllamaEmbeddingConfig;
  bedrock?: BedrockEmbeddingConfig;
}

/**
 * Create an embedding provider based on configuration
 */
export function createEmbeddingProvider(
  options: CreateEmbeddingProviderOptions
): EmbeddingProvider {
  switch (options.type) {
    case "bedrock":
      return createBedrockEmbedding(options.bedrock);
    case "ollama":
      return createOllamaEmbedding(options.ollama);
  }
}
