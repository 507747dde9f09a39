import type { LLMMessage } from "../providers/types";
import type { EnrichedContext } from "../../types/context";
import type { RetrievedChunk } from "../../rag/types";

export interface ChecklistPromptInput {
  context: EnrichedContext;
  chunks: RetrievedChunk[];
}

/** Most recent log lines included in the prompt */
const MAX_LOG_LINES = 20;

const SYSTEM_PROMPT = `You are an expert site reliability engineer. Your job is to turn an active alert into a concise, step-by-step troubleshooting checklist.

You will be given:
1. ALERT CONTEXT: the alert, the affected resource, recent metrics and recent logs.
2. RELEVANT RUNBOOK SECTIONS: passages from the team's runbooks, each with an id.

You MUST respond with valid JSON only, no other text.

The JSON schema you must follow:
{
  "summary": "One or two sentences describing the situation and the overall plan",
  "steps": [
    {
      "description": "A single concrete action, starting with a verb",
      "priority": "LOW" | "MEDIUM" | "HIGH" | "CRITICAL",
      "rationale": "Why this step matters for this alert",
      "commands": ["Exact shell or CLI commands, if the runbook gives any"],
      "sourceChunkId": "The id of the runbook section this step came from, if any"
    }
  ]
}

## Guidelines

- Order steps the way an on-call engineer should perform them.
- Prioritize safety and data integrity: check backups before destructive actions.
- Prefer steps and commands from the runbook sections; cite them with sourceChunkId.
- Use HIGH or CRITICAL for steps that mitigate customer impact right now.
- If the runbook sections do not cover the alert, give general best practices for the alert type and leave sourceChunkId out.
- Keep the checklist to 3-10 steps.`;

function formatResource(context: EnrichedContext): string {
  const resource = context.resource;
  if (!resource) {
    return "- Resource: unknown";
  }

  const lines = [
    `- Resource: ${resource.displayName} (${resource.id})`,
    `- Shape: ${resource.shape ?? "unknown"}`,
  ];
  if (resource.availabilityZone) {
    lines.push(`- Zone: ${resource.availabilityZone}`);
  }
  const tags = Object.entries(resource.tags).map(([key, value]) => `${key}=${value}`);
  if (tags.length > 0) {
    lines.push(`- Tags: ${tags.join(", ")}`);
  }
  return lines.join("\n");
}

function formatMetrics(context: EnrichedContext): string {
  if (context.metrics.length === 0) {
    return "No recent metrics available.";
  }
  return context.metrics
    .map((m) => `- ${m.timestamp} ${m.metricName} = ${m.value} ${m.unit}`)
    .join("\n");
}

function formatLogs(context: EnrichedContext): string {
  if (context.logs.length === 0) {
    return "No recent logs available.";
  }
  return context.logs
    .slice(-MAX_LOG_LINES)
    .map((log) => `- ${log.timestamp} [${log.severity}] ${log.message}`)
    .join("\n");
}

function formatChunks(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) {
    return "No specific runbook sections were found for this alert.";
  }
  return chunks
    .map(
      ({ chunk }) => `---
id: ${chunk.id}
Runbook: ${chunk.sourcePath} (Section: ${chunk.sectionTitle})
${chunk.content}`
    )
    .join("\n");
}

export function buildChecklistPrompt(input: ChecklistPromptInput): LLMMessage[] {
  const { context, chunks } = input;
  const { alert } = context;

  const userContent = `### ALERT CONTEXT
- Title: ${alert.title}
- Severity: ${alert.severity}
- Source: ${alert.sourceService}
- Message: ${alert.message}
${formatResource(context)}

### RECENT METRICS
${formatMetrics(context)}

### RECENT LOGS
${formatLogs(context)}

### RELEVANT RUNBOOK SECTIONS
${formatChunks(chunks)}

Based on the context and runbook sections above, generate the troubleshooting checklist in JSON format.`;

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: userContent },
  ];
}
