import { describe, it, expect, beforeEach, vi } from "vitest";

const { mockInvokeModel } = vi.hoisted(() => ({
  mockInvokeModel: vi.fn(),
}));

vi.mock("@aws-sdk/client-bedrock-runtime", () => {
  const MockBedrockRuntimeClient = function (this: Record<string, unknown>) {
    this.send = (command: { _type: string }) => {
      if (command._type === "InvokeModelCommand") {
        return mockInvokeModel(command);
      }
      throw new Error(`Unknown command: ${command._type}`);
    };
  };

  function InvokeModelCommand(this: Record<string, unknown>, params: Record<string, unknown>) {
    Object.assign(this, params);
    this._type = "InvokeModelCommand";
  }

  return {
    BedrockRuntimeClient: MockBedrockRuntimeClient,
    InvokeModelCommand,
  };
});

import {
  BedrockEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  getBedrockModelDimension,
  getOllamaModelDimension,
} from "../rag/embeddings";
import { RetryableError } from "../utils/retry";

const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function bedrockBody(body: unknown): { body: Uint8Array } {
  return { body: new TextEncoder().encode(JSON.stringify(body)) };
}

describe("OllamaEmbeddingProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("posts the text to /api/embeddings", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    const provider = new OllamaEmbeddingProvider({
      baseUrl: "http://ollama:11434/",
      model: "nomic-embed-text",
      dimension: 3,
    });

    await expect(provider.embed("disk full")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(mockFetch).toHaveBeenCalledWith("http://ollama:11434/api/embeddings", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: "nomic-embed-text", prompt: "disk full" }),
    });
  });

  it("infers the dimension from the model name", () => {
    expect(new OllamaEmbeddingProvider().dimension).toBe(768);
    expect(new OllamaEmbeddingProvider({ model: "mxbai-embed-large:latest" }).dimension).toBe(1024);
    expect(getOllamaModelDimension("all-minilm")).toBe(384);
    expect(getOllamaModelDimension("unknown-model")).toBe(768);
  });

  it("rejects a vector of the wrong dimension", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embedding: [1, 2] }));
    const provider = new OllamaEmbeddingProvider({ dimension: 3 });

    await expect(provider.embed("text")).rejects.toThrow(
      "Ollama model nomic-embed-text returned 2 dimensions, expected 3"
    );
  });

  it("surfaces server errors as retryable", async () => {
    mockFetch.mockResolvedValueOnce(new Response("model loading", { status: 503 }));
    const provider = new OllamaEmbeddingProvider();

    const error = await provider.embed("text").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetryableError);
    expect(error).toHaveProperty("message", "Ollama embedding API error: 503 - model loading");
  });
});

describe("BedrockEmbeddingProvider", () => {
  beforeEach(() => {
    mockInvokeModel.mockReset();
  });

  it("uses the Titan request and response format", async () => {
    mockInvokeModel.mockResolvedValueOnce(bedrockBody({ embedding: [1, 0] }));
    const provider = new BedrockEmbeddingProvider({ dimension: 2 });

    await expect(provider.embed("cpu high")).resolves.toEqual([1, 0]);
    expect(mockInvokeModel).toHaveBeenCalledWith(
      expect.objectContaining({
        modelId: "amazon.titan-embed-text-v2:0",
        body: JSON.stringify({ inputText: "cpu high" }),
        contentType: "application/json",
      })
    );
  });

  it("uses the Cohere request and response format", async () => {
    mockInvokeModel.mockResolvedValueOnce(bedrockBody({ embeddings: [[0, 1]] }));
    const provider = new BedrockEmbeddingProvider({ modelId: "cohere.embed-english-v3", dimension: 2 });

    await expect(provider.embed("cpu high")).resolves.toEqual([0, 1]);
    expect(mockInvokeModel).toHaveBeenCalledWith(
      expect.objectContaining({
        body: JSON.stringify({ texts: ["cpu high"], input_type: "search_document" }),
      })
    );
  });

  it("rejects a vector of the wrong dimension", async () => {
    mockInvokeModel.mockResolvedValueOnce(bedrockBody({ embedding: [1, 0, 0] }));
    const provider = new BedrockEmbeddingProvider({ dimension: 2 });

    await expect(provider.embed("text")).rejects.toThrow(
      "Bedrock model amazon.titan-embed-text-v2:0 returned 3 dimensions, expected 2"
    );
  });

  it("knows the dimensions of common models", () => {
    expect(getBedrockModelDimension("amazon.titan-embed-text-v1")).toBe(1536);
    expect(getBedrockModelDimension("amazon.titan-embed-text-v2:0")).toBe(1024);
  });
});

describe("createEmbeddingProvider", () => {
  it("creates the configured provider", () => {
    expect(createEmbeddingProvider({ type: "ollama" }).name).toBe("ollama");
    expect(createEmbeddingProvider({ type: "bedrock", bedrock: { region: "eu-west-1" } }).name).toBe(
      "bedrock"
    );
  });
});
