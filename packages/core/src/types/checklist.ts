import { z } from "zod";
import { AlertSeveritySchema } from "./alert";

export const StepPrioritySchema = z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]);

export const ChecklistStepSchema = z.object({
  /** 1-based position in the checklist */
  order: z.number().int().positive(),
  description: z.string().min(1),
  priority: StepPrioritySchema,
  rationale: z.string().optional(),
  commands: z.array(z.string()).default([]),
  /** Id of the runbook chunk this step was derived from */
  sourceChunkId: z.string().optional(),
});

export const DynamicChecklistSchema = z.object({
  alertId: z.string().min(1),
  alertTitle: z.string(),
  severity: AlertSeveritySchema,
  labels: z.record(z.string(), z.string()),
  summary: z.string(),
  steps: z.array(ChecklistStepSchema).min(1),
  sourceRunbooks: z.array(z.string()),
  generatedAt: z.string().datetime(),
  llmProvider: z.string(),
});

export const GenerationConfigSchema = z.object({
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  topK: z.number().int().min(1, "topK must be at least 1"),
});

export type StepPriority = z.infer<typeof StepPrioritySchema>;
export type ChecklistStep = z.infer<typeof ChecklistStepSchema>;
export type DynamicChecklist = z.infer<typeof DynamicChecklistSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
