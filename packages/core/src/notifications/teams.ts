import type { AlertSeverity } from "../types/alert";
import type { DynamicChecklist } from "../types/checklist";
import { formatStepLine, getSeverityEmoji } from "./format";
import { postJson } from "./http";
import type { WebhookConfig, WebhookDestination } from "./types";

// Microsoft Teams Adaptive Card types
export interface TeamsAdaptiveCard {
  type: "AdaptiveCard";
  $schema: string;
  version: string;
  body: AdaptiveCardElement[];
}

export interface AdaptiveCardElement {
  type: string;
  text?: string;
  weight?: string;
  size?: string;
  color?: string;
  wrap?: boolean;
  spacing?: string;
  facts?: Array<{ title: string; value: string }>;
}

export interface TeamsMessage {
  type: "message";
  attachments: Array<{
    contentType: string;
    contentUrl: null;
    content: TeamsAdaptiveCard;
  }>;
}

function getSeverityColor(severity: AlertSeverity): string {
  switch (severity) {
    case "CRITICAL":
      return "attention"; // Red
    case "WARNING":
      return "warning"; // Orange/Yellow
    case "INFO":
      return "accent"; // Blue
  }
}

export function formatChecklistCard(checklist: DynamicChecklist): TeamsMessage {
  const emoji = getSeverityEmoji(checklist.severity);

  const body: AdaptiveCardElement[] = [
    {
      type: "TextBlock",
      text: `${emoji} Alert: ${checklist.alertTitle}`,
      weight: "bolder",
      size: "large",
      wrap: true,
    },
    {
      type: "TextBlock",
      text: checklist.severity,
      color: getSeverityColor(checklist.severity),
      weight: "bolder",
    },
  ];

  if (checklist.summary) {
    body.push(
      {
        type: "TextBlock",
        text: "**Summary:**",
        weight: "bolder",
        spacing: "medium",
      },
      {
        type: "TextBlock",
        text: checklist.summary,
        wrap: true,
      }
    );
  }

  body.push(
    {
      type: "TextBlock",
      text: "**Troubleshooting Checklist:**",
      weight: "bolder",
      spacing: "medium",
    },
    {
      type: "TextBlock",
      // Adaptive Card markdown needs a blank line between list items
      text: checklist.steps.map(formatStepLine).join("\n\n"),
      wrap: true,
    }
  );

  const facts = [
    { title: "Alert ID", value: checklist.alertId },
    { title: "Generated by", value: checklist.llmProvider },
  ];
  if (checklist.sourceRunbooks.length > 0) {
    facts.push({ title: "Runbooks", value: checklist.sourceRunbooks.join(", ") });
  }
  body.push({ type: "FactSet", facts, spacing: "medium" });

  const card: TeamsAdaptiveCard = {
    type: "AdaptiveCard",
    $schema: "http://adaptivecards.io/schemas/adaptive-card.json",
    version: "1.4",
    body,
  };

  return {
    type: "message",
    attachments: [
      {
        contentType: "application/vnd.microsoft.card.adaptive",
        contentUrl: null,
        content: card,
      },
    ],
  };
}

export class TeamsDestination implements WebhookDestination {
  private url: string;

  constructor(readonly config: WebhookConfig) {
    if (!config.url) {
      throw new Error(`Teams destination ${config.name} requires a url`);
    }
    this.url = config.url;
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    await postJson(
      this.url,
      formatChecklistCard(checklist),
      `Teams ${this.config.name}`,
      this.config.headers
    );
  }
}
