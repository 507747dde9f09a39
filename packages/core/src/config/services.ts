/**
 * Service wiring: picks one variant per port from configuration and
 * assembles ingestion, enrichment, retrieval, generation and dispatch.
 */

import type {
  ComputeMetadataPort,
  LogsPort,
  MetricsPort,
  StoragePort,
} from "../adapters/types";
import { S3RunbookStorage } from "../adapters/aws/s3-storage";
import { Ec2ComputeMetadata } from "../adapters/aws/ec2-metadata";
import { CloudWatchMetricsSource } from "../adapters/aws/cloudwatch-metrics";
import { CloudWatchLogsSource } from "../adapters/aws/cloudwatch-logs";
import { LocalRunbookStorage } from "../adapters/local/file-storage";
import { NoComputeMetadata, NoLogs, NoMetrics } from "../adapters/local/empty-sources";
import { LlmChecklistGenerator } from "../checklist/generator";
import { AlertPipeline, type StateChangeListener } from "../checklist/pipeline";
import { ContextEnrichmentService } from "../enrichment/service";
import { createLLMProvider } from "../llm/client";
import type { LLMProvider } from "../llm/providers/types";
import { loadWebhookConfig } from "../notifications/config-loader";
import { WebhookDispatcher } from "../notifications/dispatcher";
import { createDestination, fileOutputConfig } from "../notifications/factory";
import type { WebhookConfig, WebhookDestination } from "../notifications/types";
import { RunbookChunker } from "../rag/chunker";
import { createEmbeddingProvider } from "../rag/embeddings";
import { RunbookIngestionPipeline } from "../rag/ingestion";
import { RunbookRetriever } from "../rag/retriever";
import { createVectorStore } from "../rag/stores";
import type { EmbeddingProvider, VectorStore } from "../rag/types";
import { ConfigError } from "../types/errors";
import type { AppConfig } from "./index";

/**
 * Replacements for configured variants, used by tests and scripts
 */
export interface ServiceOverrides {
  storage?: StoragePort;
  metadata?: ComputeMetadataPort;
  metrics?: MetricsPort;
  logs?: LogsPort;
  embeddings?: EmbeddingProvider;
  store?: VectorStore;
  llm?: LLMProvider;
  destinations?: WebhookDestination[];
  onStateChange?: StateChangeListener;
}

export interface Services {
  config: AppConfig;
  /** Prefix passed to ingestAll for the configured storage */
  runbookPrefix: string;
  storage: StoragePort;
  embeddings: EmbeddingProvider;
  store: VectorStore;
  llm: LLMProvider;
  ingestion: RunbookIngestionPipeline;
  enrichment: ContextEnrichmentService;
  retriever: RunbookRetriever;
  dispatcher: WebhookDispatcher;
  pipeline: AlertPipeline;
}

function createStorage(config: AppConfig): StoragePort {
  if (config.cloudProvider === "aws") {
    if (!config.runbookBucket) {
      throw new ConfigError("RUNBOOK_BUCKET is required for aws storage");
    }
    return new S3RunbookStorage({ bucket: config.runbookBucket, region: config.awsRegion });
  }
  return new LocalRunbookStorage(config.runbookLocalDir);
}

function createSources(config: AppConfig): {
  metadata: ComputeMetadataPort;
  metrics: MetricsPort;
  logs: LogsPort;
} {
  if (config.cloudProvider !== "aws") {
    return { metadata: new NoComputeMetadata(), metrics: new NoMetrics(), logs: new NoLogs() };
  }

  const region = config.awsRegion;
  const logGroupName = config.enrichment.logGroupName;
  return {
    metadata: new Ec2ComputeMetadata({ region }),
    metrics: new CloudWatchMetricsSource({ region }),
    logs: logGroupName ? new CloudWatchLogsSource({ logGroupName, region }) : new NoLogs(),
  };
}

function createEmbeddings(config: AppConfig): EmbeddingProvider {
  const { provider, model, dimension } = config.embedding;
  return createEmbeddingProvider({
    type: provider,
    ollama: { baseUrl: config.ollamaBaseUrl, model, dimension },
    bedrock: { region: config.awsRegion, modelId: model, dimension },
  });
}

function createStore(config: AppConfig, dimension: number): VectorStore {
  return createVectorStore({
    type: config.vectorStore.type,
    dimension,
    file: { dataDir: config.vectorStore.dir },
    pg: { connectionString: config.vectorStore.databaseUrl },
  });
}

async function createDestinations(config: AppConfig): Promise<WebhookDestination[]> {
  const configs: WebhookConfig[] = config.webhookConfigPath
    ? await loadWebhookConfig(config.webhookConfigPath)
    : [];

  if (config.checklistOutputDir) {
    configs.push(fileOutputConfig(config.checklistOutputDir));
  }

  return configs.map((webhook) =>
    createDestination(webhook, { resendApiKey: config.resendApiKey })
  );
}

export async function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<Services> {
  const storage = overrides.storage ?? createStorage(config);
  const sources = createSources(config);
  const embeddings = overrides.embeddings ?? createEmbeddings(config);
  const store = overrides.store ?? createStore(config, embeddings.dimension);
  const llm =
    overrides.llm ??
    createLLMProvider({
      provider: config.llm.provider,
      model: config.llm.model,
      ollamaBaseUrl: config.ollamaBaseUrl,
      anthropicApiKey: config.anthropicApiKey,
      bedrockRegion: config.awsRegion,
    });
  const destinations = overrides.destinations ?? (await createDestinations(config));

  await store.initialize();

  const ingestion = new RunbookIngestionPipeline({
    storage,
    embeddings,
    store,
    chunker: new RunbookChunker({ maxChunkSize: config.chunkMaxSize }),
    embeddingTimeoutMs: config.embedding.timeoutMs,
  });

  const enrichment = new ContextEnrichmentService({
    metadata: overrides.metadata ?? sources.metadata,
    metrics: overrides.metrics ?? sources.metrics,
    logs: overrides.logs ?? sources.logs,
    lookbackMinutes: config.enrichment.lookbackMinutes,
    timeoutMs: config.enrichment.timeoutMs,
    logQuery: config.enrichment.logQuery,
  });

  const retriever = new RunbookRetriever({
    embeddings,
    store,
    embeddingTimeoutMs: config.embedding.timeoutMs,
  });

  const dispatcher = new WebhookDispatcher(destinations);

  const pipeline = new AlertPipeline({
    enrichment,
    retriever,
    generator: new LlmChecklistGenerator({ provider: llm, timeoutMs: config.llm.timeoutMs }),
    dispatcher,
    generationConfig: {
      model: llm.model,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
      topK: config.retrievalTopK,
    },
    onStateChange: overrides.onStateChange,
  });

  console.log(
    `[Services] storage=${config.cloudProvider}, embeddings=${embeddings.name}, ` +
      `store=${store.name}, llm=${llm.name}, destinations=${destinations.length}`
  );

  return {
    config,
    runbookPrefix: config.cloudProvider === "aws" ? config.runbookPrefix : "",
    storage,
    embeddings,
    store,
    llm,
    ingestion,
    enrichment,
    retriever,
    dispatcher,
    pipeline,
  };
}
