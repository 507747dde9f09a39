import type { AlertSeverity } from "../types/alert";
import type { ChecklistStep, StepPriority } from "../types/checklist";

export function getSeverityEmoji(severity: AlertSeverity): string {
  switch (severity) {
    case "CRITICAL":
      return "🔴";
    case "WARNING":
      return "🟡";
    case "INFO":
      return "🔵";
  }
}

export function getPriorityLabel(priority: StepPriority): string {
  switch (priority) {
    case "CRITICAL":
      return "[CRITICAL]";
    case "HIGH":
      return "[HIGH]";
    case "MEDIUM":
      return "[MEDIUM]";
    case "LOW":
      return "[LOW]";
  }
}

/**
 * "1. [HIGH] Restart the service"
 */
export function formatStepLine(step: ChecklistStep): string {
  return `${step.order}. ${getPriorityLabel(step.priority)} ${step.description}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
