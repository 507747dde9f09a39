/**
 * Runbook RAG
 *
 * Chunking, embedding providers, vector stores, ingestion and retrieval.
 *
 * Usage:
 * ```typescript
 * const store = createVectorStore({ type: "memory", dimension: 768 });
 * const embeddings = createEmbeddingProvider({ type: "ollama" });
 * const ingestion = new RunbookIngestionPipeline({ storage, embeddings, store });
 *
 * await ingestion.ingestAll("runbooks/");
 * const chunks = await new RunbookRetriever({ embeddings, store }).retrieve(alert, context, 5);
 * ```
 */

export * from "./types";
export * from "./frontmatter";
export * from "./chunker";
export * from "./embeddings";
export * from "./stores";
export * from "./ingestion";
export * from "./retriever";
