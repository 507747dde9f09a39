/**
 * Runbook Ingestion Pipeline
 *
 * Reads runbooks from storage, chunks them, embeds every chunk and replaces
 * the document's chunks in the vector store. A chunk that fails to embed is
 * skipped and counted; a document fails only when it cannot be read or no
 * chunk could be embedded.
 */

import type { StoragePort } from "../adapters/types";
import { IngestionError, errorMessage } from "../types/errors";
import { withTimeout } from "../utils/timeout";
import { RunbookChunker } from "./chunker";
import type { EmbeddingProvider, ParsedChunk, RunbookChunk, VectorStore } from "./types";

const MARKDOWN_EXTENSION = /\.(md|markdown)$/i;

export interface IngestionPipelineConfig {
  storage: StoragePort;
  embeddings: EmbeddingProvider;
  store: VectorStore;
  chunker?: RunbookChunker;
  /** Per-chunk embedding timeout (default: 15000) */
  embeddingTimeoutMs?: number;
  /** Chunks embedded at once (default: 4) */
  concurrency?: number;
}

export interface IngestOneResult {
  path: string;
  chunksStored: number;
  chunksFailed: number;
}

export interface IngestionFailure {
  path: string;
  error: string;
}

export interface IngestAllResult {
  documentsProcessed: number;
  documentsFailed: number;
  chunksStored: number;
  chunksFailed: number;
  failures: IngestionFailure[];
}

export class RunbookIngestionPipeline {
  private storage: StoragePort;
  private embeddings: EmbeddingProvider;
  private store: VectorStore;
  private chunker: RunbookChunker;
  private embeddingTimeoutMs: number;
  private concurrency: number;
  // Tail of the ingestion queue for each path
  private pathLocks = new Map<string, Promise<unknown>>();

  constructor(config: IngestionPipelineConfig) {
    this.storage = config.storage;
    this.embeddings = config.embeddings;
    this.store = config.store;
    this.chunker = config.chunker ?? new RunbookChunker();
    this.embeddingTimeoutMs = config.embeddingTimeoutMs ?? 15000;
    this.concurrency = Math.max(1, config.concurrency ?? 4);
  }

  /**
   * Ingest one runbook. Calls for the same path run one after another.
   */
  ingestOne(path: string): Promise<IngestOneResult> {
    const previous = this.pathLocks.get(path) ?? Promise.resolve();
    const run = previous.then(
      () => this.ingestDocument(path),
      () => this.ingestDocument(path)
    );

    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.pathLocks.set(path, tail);
    void tail.then(() => {
      if (this.pathLocks.get(path) === tail) {
        this.pathLocks.delete(path);
      }
    });

    return run;
  }

  /**
   * Ingest every markdown runbook under a prefix. A document failure is
   * recorded and the batch continues; only a failed listing throws.
   */
  async ingestAll(prefix: string): Promise<IngestAllResult> {
    const paths = (await this.storage.list(prefix)).filter((path) =>
      MARKDOWN_EXTENSION.test(path)
    );

    console.log(`[IngestionPipeline] Ingesting ${paths.length} runbooks under "${prefix}"`);

    const result: IngestAllResult = {
      documentsProcessed: 0,
      documentsFailed: 0,
      chunksStored: 0,
      chunksFailed: 0,
      failures: [],
    };

    for (const path of paths) {
      try {
        const outcome = await this.ingestOne(path);
        result.documentsProcessed++;
        result.chunksStored += outcome.chunksStored;
        result.chunksFailed += outcome.chunksFailed;
      } catch (error) {
        result.documentsFailed++;
        result.failures.push({ path, error: errorMessage(error) });
        console.warn(`[IngestionPipeline] Failed to ingest ${path}: ${errorMessage(error)}`);
      }
    }

    console.log(
      `[IngestionPipeline] Done: ${result.documentsProcessed} documents, ` +
        `${result.chunksStored} chunks stored, ${result.documentsFailed} documents failed, ` +
        `${result.chunksFailed} chunks failed`
    );

    return result;
  }

  private async ingestDocument(path: string): Promise<IngestOneResult> {
    let content: string | null;
    try {
      content = await this.storage.read(path);
    } catch (error) {
      throw new IngestionError(`Failed to read runbook ${path}`, path, { cause: error });
    }

    if (content === null) {
      throw new IngestionError(`Runbook not found: ${path}`, path);
    }

    const parsed = this.chunker.chunk({ path, content });
    const embedded: RunbookChunk[] = [];
    let chunksFailed = 0;
    let lastError: unknown;

    for (let i = 0; i < parsed.length; i += this.concurrency) {
      const batch = parsed.slice(i, i + this.concurrency);
      const results = await Promise.allSettled(batch.map((chunk) => this.embedChunk(chunk)));

      results.forEach((outcome, index) => {
        if (outcome.status === "fulfilled") {
          embedded.push(outcome.value);
        } else {
          chunksFailed++;
          lastError = outcome.reason;
          console.warn(
            `[IngestionPipeline] Skipping chunk ${batch[index].id}: ${errorMessage(outcome.reason)}`
          );
        }
      });
    }

    if (parsed.length > 0 && embedded.length === 0) {
      throw new IngestionError(`Embedding failed for every chunk of ${path}`, path, {
        cause: lastError,
      });
    }

    let removed: number;
    try {
      removed = await this.store.replace(path, embedded);
    } catch (error) {
      throw new IngestionError(`Failed to store chunks of ${path}`, path, { cause: error });
    }

    console.log(
      `[IngestionPipeline] ${path}: stored ${embedded.length} chunks` +
        (removed > 0 ? `, replaced ${removed}` : "") +
        (chunksFailed > 0 ? `, ${chunksFailed} failed` : "")
    );

    return { path, chunksStored: embedded.length, chunksFailed };
  }

  private async embedChunk(chunk: ParsedChunk): Promise<RunbookChunk> {
    const embedding = await withTimeout(
      this.embeddings.embed(chunk.content),
      this.embeddingTimeoutMs,
      `Embedding timed out after ${this.embeddingTimeoutMs}ms`
    );
    return { ...chunk, embedding };
  }
}

/**
 * Startup ingestion: a failure is logged and never propagates.
 */
export async function runStartupIngestion(
  pipeline: RunbookIngestionPipeline,
  prefix: string
): Promise<IngestAllResult | null> {
  try {
    return await pipeline.ingestAll(prefix);
  } catch (error) {
    console.warn(
      `[IngestionPipeline] Startup ingestion failed, continuing with current index: ${errorMessage(error)}`
    );
    return null;
  }
}
