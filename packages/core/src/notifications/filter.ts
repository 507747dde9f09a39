import type { DynamicChecklist } from "../types/checklist";
import type { WebhookFilter } from "./types";

export function matchesWebhookFilter(filter: WebhookFilter, checklist: DynamicChecklist): boolean {
  if (filter.severities && filter.severities.length > 0) {
    if (!filter.severities.includes(checklist.severity)) {
      return false;
    }
  }

  for (const [key, value] of Object.entries(filter.requiredLabels ?? {})) {
    if (checklist.labels[key] !== value) {
      return false;
    }
  }

  return true;
}
