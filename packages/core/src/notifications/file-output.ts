import fs from "fs/promises";
import path from "path";
import type { DynamicChecklist } from "../types/checklist";
import type { WebhookConfig, WebhookDestination } from "./types";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * yyyyMMdd-HHmmss in UTC
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function checklistFileName(checklist: DynamicChecklist): string {
  const safeId = checklist.alertId.replace(/[^A-Za-z0-9._-]/g, "_");
  return `checklist-${safeId}-${formatFileTimestamp(new Date(checklist.generatedAt))}.json`;
}

/**
 * Writes each checklist as a JSON file into the directory named by `url`
 */
export class FileOutputDestination implements WebhookDestination {
  private outputDir: string;

  constructor(readonly config: WebhookConfig) {
    if (!config.url) {
      throw new Error(`File destination ${config.name} requires an output directory`);
    }
    this.outputDir = config.url;
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, checklistFileName(checklist));
    await fs.writeFile(filePath, JSON.stringify(checklist, null, 2));
    console.log(`[FileOutput] Wrote ${filePath}`);
  }
}
