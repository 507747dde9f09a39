import type { Alert } from "../types/alert";
import type { DynamicChecklist } from "../types/checklist";
import type { WebhookConfig } from "../notifications/types";
import type { EnrichedContext } from "../types/context";
import type { RetrievedChunk, RunbookChunk, RunbookMetadata } from "../rag/types";

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: "alert-1",
    title: "High memory on web-01",
    message: "Memory utilization above 90%",
    severity: "CRITICAL",
    sourceService: "aws-cloudwatch-sns",
    dimensions: { InstanceId: "i-0abc" },
    labels: {},
    timestamp: "2026-10-18T09:45:00.000Z",
    ...overrides,
  };
}

export function makeContext(
  alert: Alert = makeAlert(),
  overrides: Partial<EnrichedContext> = {}
): EnrichedContext {
  return {
    alert,
    resource: null,
    metrics: [],
    logs: [],
    degradedSources: [],
    ...overrides,
  };
}

export function makeChunk(
  id: string,
  embedding: number[],
  metadata: Partial<RunbookMetadata> = {}
): RunbookChunk {
  const [sourcePath, index = "0"] = id.split("#");
  return {
    id,
    sourcePath,
    sectionTitle: "Section",
    content: `content of ${id}`,
    chunkIndex: Number(index),
    metadata: { tags: [], applicableShapes: [], ...metadata },
    embedding,
  };
}

export function retrieved(chunk: RunbookChunk, score: number): RetrievedChunk {
  return { chunk, similarity: score, score };
}

export function makeChecklist(overrides: Partial<DynamicChecklist> = {}): DynamicChecklist {
  return {
    alertId: "alert-1",
    alertTitle: "High memory on web-01",
    severity: "CRITICAL",
    labels: { team: "platform" },
    summary: "Memory pressure from a leaking worker",
    steps: [
      {
        order: 1,
        description: "Find the top memory consumers",
        priority: "HIGH",
        commands: ["ps aux --sort=-%mem | head"],
        sourceChunkId: "memory/high-memory.md#1",
      },
      { order: 2, description: "Restart the worker", priority: "MEDIUM", commands: [] },
    ],
    sourceRunbooks: ["memory/high-memory.md"],
    generatedAt: "2026-10-18T10:00:00.000Z",
    llmProvider: "ollama",
    ...overrides,
  };
}

export function makeWebhookConfig(overrides: Partial<WebhookConfig> = {}): WebhookConfig {
  return {
    name: "hook",
    type: "generic",
    url: "https://hooks.example.com/checklists",
    enabled: true,
    headers: {},
    filter: {},
    retryCount: 2,
    retryDelayMs: 1,
    ...overrides,
  };
}
