// Types
export * from "./types";

// Utilities
export * from "./utils/retry";
export * from "./utils/timeout";

// Configuration and wiring
export * from "./config";

// Alert normalization
export * from "./alerts";

// Cloud and local adapters
export * from "./adapters";

// RAG (chunking, vector stores, ingestion, retrieval)
export * from "./rag";

// Context enrichment
export * from "./enrichment/service";

// LLM
export * from "./llm";

// Checklist generation and pipeline
export * from "./checklist";

// Notifications
export * from "./notifications";
