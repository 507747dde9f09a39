/**
 * AWS Bedrock Embedding Provider
 *
 * Uses Amazon Bedrock for generating embeddings.
 * For production use in AWS Lambda.
 */

import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";
import type { EmbeddingProvider } from "../types";

export interface BedrockEmbeddingConfig {
  /** AWS region */
  region?: string;
  /** Model ID to use */
  modelId?: string;
  /** Override the dimension inferred from the model id */
  dimension?: number;
  /** Injected client */
  client?: BedrockRuntimeClient;
}

const TitanResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const CohereResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

/**
 * Get embedding dimension for Bedrock models
 */
export function getBedrockModelDimension(modelId: string): number {
  const dimensions: Record<string, number> = {
    "amazon.titan-embed-text-v1": 1536,
    "amazon.titan-embed-text-v2:0": 1024,
    "cohere.embed-english-v3": 1024,
    "cohere.embed-multilingual-v3": 1024,
  };

  // Default to Titan v2 dimension
  return dimensions[modelId] || 1024;
}

export class BedrockEmbeddingProvider implements EmbeddingProvider {
  readonly name = "bedrock";
  readonly dimension: number;

  private client: BedrockRuntimeClient;
  private modelId: string;

  constructor(config: BedrockEmbeddingConfig = {}) {
    const region = config.region || "us-east-1";
    this.modelId = config.modelId || "amazon.titan-embed-text-v2:0";
    this.dimension = config.dimension ?? getBedrockModelDimension(this.modelId);

    this.client = config.client ?? new BedrockRuntimeClient({ region });
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    const command = new InvokeModelCommand({
      modelId: this.modelId,
      body: JSON.stringify(this.formatRequest(text)),
      contentType: "application/json",
      accept: "application/json",
    });

    const response = await this.client.send(command);
    const result: unknown = JSON.parse(new TextDecoder().decode(response.body));

    const embedding = this.extractEmbedding(result);
    if (embedding.length !== this.dimension) {
      throw new Error(
        `Bedrock model ${this.modelId} returned ${embedding.length} dimensions, expected ${this.dimension}`
      );
    }
    return embedding;
  }

  /**
   * Format request body based on model
   */
  private formatRequest(text: string): Record<string, unknown> {
    if (this.modelId.startsWith("cohere")) {
      return {
        texts: [text],
        input_type: "search_document",
      };
    }

    // Titan format
    return { inputText: text };
  }

  /**
   * Extract embedding from response based on model
   */
  private extractEmbedding(result: unknown): number[] {
    if (this.modelId.startsWith("cohere")) {
      return CohereResponseSchema.parse(result).embeddings[0];
    }

    return TitanResponseSchema.parse(result).embedding;
  }
}

/**
 * Create Bedrock embedding provider
 */
export function createBedrockEmbedding(config?: BedrockEmbeddingConfig): EmbeddingProvider {
  return new BedrockEmbeddingProvider(config);
}
