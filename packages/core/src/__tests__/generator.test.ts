import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  LlmChecklistGenerator,
  parseChecklistResponse,
  parseMarkdownChecklist,
} from "../checklist/generator";
import { buildChecklistPrompt } from "../llm/prompts/checklist";
import type { LLMProvider } from "../llm/providers/types";
import type { GenerationConfig } from "../types/checklist";
import { GenerationError } from "../types/errors";
import { makeAlert, makeChunk, makeContext, retrieved } from "./fixtures";

const config: GenerationConfig = { model: "fake-1", maxTokens: 1024, temperature: 0.2, topK: 2 };

const chunks = [
  retrieved(makeChunk("runbooks/memory.md#0", [1, 0]), 0.9),
  retrieved(makeChunk("runbooks/memory.md#1", [1, 0]), 0.8),
  retrieved(makeChunk("runbooks/cpu.md#0", [1, 0]), 0.5),
];

describe("parseChecklistResponse", () => {
  const known = new Set(["runbooks/memory.md#0"]);

  it("reads JSON steps, normalizing priorities and renumbering", () => {
    const reply = JSON.stringify({
      summary: "  Memory pressure on web-01.  ",
      steps: [
        {
          description: "Check memory usage",
          priority: "high",
          rationale: "Confirms the alert",
          commands: ["free -h", " "],
          sourceChunkId: "runbooks/memory.md#0",
        },
        { description: "", priority: "LOW" },
        null,
        { description: "Restart the leaking service", priority: "urgent", sourceChunkId: "invented#9" },
      ],
    });

    expect(parseChecklistResponse(reply, known)).toEqual({
      summary: "Memory pressure on web-01.",
      steps: [
        {
          order: 1,
          description: "Check memory usage",
          priority: "HIGH",
          rationale: "Confirms the alert",
          commands: ["free -h"],
          sourceChunkId: "runbooks/memory.md#0",
        },
        {
          order: 2,
          description: "Restart the leaking service",
          priority: "MEDIUM",
          commands: [],
        },
      ],
    });
  });

  it("reads JSON inside a code fence", () => {
    const reply = '```json\n{"summary":"s","steps":[{"description":"Check logs","priority":"LOW"}]}\n```';

    expect(parseChecklistResponse(reply, known).steps).toEqual([
      { order: 1, description: "Check logs", priority: "LOW", commands: [] },
    ]);
  });

  it("falls back to markdown when the JSON has the wrong shape", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = parseChecklistResponse('{"summary":"s","steps":"none"}', known);

    expect(result.steps).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("parseMarkdownChecklist", () => {
  it("reads numbered, bulleted and Step N lines", () => {
    const markdown = [
      "## Memory pressure on web-01",
      "",
      "1. Check memory usage with free -h",
      "2) [ ] Restart the service (urgent)",
      "- Scale the instance up",
      "Step 4: Watch for CRITICAL errors",
      "* ",
    ].join("\n");

    expect(parseMarkdownChecklist(markdown)).toEqual({
      summary: "Memory pressure on web-01",
      steps: [
        { order: 1, description: "Check memory usage with free -h", priority: "MEDIUM", commands: [] },
        { order: 2, description: "Restart the service (urgent)", priority: "HIGH", commands: [] },
        { order: 3, description: "Scale the instance up", priority: "MEDIUM", commands: [] },
        { order: 4, description: "Watch for CRITICAL errors", priority: "HIGH", commands: [] },
      ],
    });
  });

  it("truncates a long summary", () => {
    const { summary } = parseMarkdownChecklist(`${"x".repeat(250)}\n1. step`);

    expect(summary).toBe(`${"x".repeat(197)}...`);
  });
});

describe("LlmChecklistGenerator", () => {
  const completeFn = vi.fn<LLMProvider["complete"]>();
  const provider: LLMProvider = { name: "fake", model: "fake-1", complete: completeFn };

  beforeEach(() => {
    completeFn.mockReset();
  });

  it("prompts with the top chunks and parses the reply", async () => {
    completeFn.mockResolvedValueOnce(
      JSON.stringify({
        summary: "Memory pressure",
        steps: [
          { description: "Check memory", priority: "HIGH", sourceChunkId: "runbooks/memory.md#1" },
          { description: "Check CPU", priority: "LOW", sourceChunkId: "runbooks/cpu.md#0" },
        ],
      })
    );
    const generator = new LlmChecklistGenerator({ provider });
    const context = makeContext();

    const result = await generator.generate({ context, chunks, config });

    expect(generator.providerId).toBe("fake");
    expect(result.steps).toEqual([
      { order: 1, description: "Check memory", priority: "HIGH", commands: [], sourceChunkId: "runbooks/memory.md#1" },
      { order: 2, description: "Check CPU", priority: "LOW", commands: [] },
    ]);
    expect(completeFn).toHaveBeenCalledWith(buildChecklistPrompt({ context, chunks: chunks.slice(0, 2) }), {
      model: "fake-1",
      temperature: 0.2,
      maxTokens: 1024,
      retry: { maxRetries: 2 },
    });
  });

  it("asks the provider for the configured model", async () => {
    completeFn.mockResolvedValueOnce("1. Check memory");
    const generator = new LlmChecklistGenerator({ provider, maxRetries: 0 });

    await generator.generate({
      context: makeContext(),
      chunks: [],
      config: { ...config, model: "requested-model", temperature: 0, maxTokens: 10 },
    });

    expect(completeFn).toHaveBeenCalledWith(expect.any(Array), {
      model: "requested-model",
      temperature: 0,
      maxTokens: 10,
      retry: { maxRetries: 0 },
    });
  });

  it("accepts a markdown reply", async () => {
    completeFn.mockResolvedValueOnce("Plan:\n1. Check memory\n2. Restart service");
    const generator = new LlmChecklistGenerator({ provider });

    const result = await generator.generate({ context: makeContext(), chunks: [], config });

    expect(result.summary).toBe("Plan:");
    expect(result.steps.map((step) => step.description)).toEqual(["Check memory", "Restart service"]);
  });

  it("fails when the reply has no steps", async () => {
    completeFn.mockResolvedValueOnce("I cannot help with that.");
    const generator = new LlmChecklistGenerator({ provider });

    await expect(generator.generate({ context: makeContext(), chunks, config })).rejects.toThrow(
      new GenerationError("LLM reply contained no checklist steps")
    );
  });

  it("wraps provider failures", async () => {
    const cause = new Error("model not found");
    completeFn.mockRejectedValueOnce(cause);
    const generator = new LlmChecklistGenerator({ provider, maxRetries: 0 });

    const error = await generator.generate({ context: makeContext(), chunks, config }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ message: "LLM generation failed: model not found", cause });
  });

  it("times out a slow provider", async () => {
    completeFn.mockReturnValueOnce(new Promise(() => {}));
    const generator = new LlmChecklistGenerator({ provider, timeoutMs: 20 });

    await expect(generator.generate({ context: makeContext(), chunks, config })).rejects.toThrow(
      "LLM generation failed: Generation timed out after 20ms"
    );
  });
});

describe("buildChecklistPrompt", () => {
  it("includes the alert, resource, metrics, recent logs and runbook sections", () => {
    const alert = makeAlert();
    const logs = Array.from({ length: 25 }, (_, i) => ({
      timestamp: `2026-10-18T09:${String(30 + i).padStart(2, "0")}:00.000Z`,
      message: `line ${i}`,
      source: "app",
      severity: "INFO",
    }));
    const context = makeContext(alert, {
      resource: {
        id: "i-0abc",
        displayName: "web-01",
        shape: "t3.large",
        availabilityZone: "us-east-1a",
        tags: { team: "platform" },
      },
      metrics: [
        { metricName: "CPUUtilization", timestamp: "2026-10-18T09:40:00.000Z", value: 92, unit: "Percent" },
      ],
      logs,
    });

    const [system, user] = buildChecklistPrompt({ context, chunks: chunks.slice(0, 1) });

    expect(system.role).toBe("system");
    expect(user.role).toBe("user");
    expect(user.content).toContain("- Title: High memory on web-01\n- Severity: CRITICAL");
    expect(user.content).toContain(
      "- Resource: web-01 (i-0abc)\n- Shape: t3.large\n- Zone: us-east-1a\n- Tags: team=platform"
    );
    expect(user.content).toContain("- 2026-10-18T09:40:00.000Z CPUUtilization = 92 Percent");
    expect(user.content).not.toContain("] line 4\n");
    expect(user.content).toContain("- 2026-10-18T09:35:00.000Z [INFO] line 5\n");
    expect(user.content).toContain(
      "---\nid: runbooks/memory.md#0\nRunbook: runbooks/memory.md (Section: Section)\ncontent of runbooks/memory.md#0"
    );
  });

  it("says when context is missing", () => {
    const [, user] = buildChecklistPrompt({ context: makeContext(), chunks: [] });

    expect(user.content).toContain("- Resource: unknown");
    expect(user.content).toContain("No recent metrics available.");
    expect(user.content).toContain("No recent logs available.");
    expect(user.content).toContain("No specific runbook sections were found for this alert.");
  });
});
