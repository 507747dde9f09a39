import type { DynamicChecklist } from "../types/checklist";
import { formatStepLine, getSeverityEmoji } from "./format";
import { postJson } from "./http";
import type { WebhookConfig, WebhookDestination } from "./types";

interface SlackBlock {
  type: string;
  text?: {
    type: string;
    text: string;
    emoji?: boolean;
  };
  elements?: Array<{
    type: string;
    text: string;
  }>;
}

export interface SlackMessage {
  text: string;
  blocks: SlackBlock[];
}

/** Slack rejects section text over 3000 characters */
const MAX_SECTION_TEXT = 3000;

function clip(text: string): string {
  return text.length > MAX_SECTION_TEXT ? `${text.slice(0, MAX_SECTION_TEXT - 3)}...` : text;
}

export function formatChecklistMessage(checklist: DynamicChecklist): SlackMessage {
  const emoji = getSeverityEmoji(checklist.severity);
  const fallbackText = `${emoji} [${checklist.severity}] ${checklist.alertTitle}`;

  const blocks: SlackBlock[] = [
    {
      type: "header",
      text: {
        type: "plain_text",
        text: `${emoji} ${checklist.alertTitle}`,
        emoji: true,
      },
    },
    {
      type: "section",
      text: {
        type: "mrkdwn",
        text: `*Severity:* \`${checklist.severity}\``,
      },
    },
  ];

  if (checklist.summary) {
    blocks.push({
      type: "section",
      text: {
        type: "mrkdwn",
        text: clip(`*Summary*\n${checklist.summary}`),
      },
    });
  }

  const stepsText = checklist.steps
    .map((step) => {
      const commands = step.commands.map((command) => `    \`${command}\``).join("\n");
      return commands ? `${formatStepLine(step)}\n${commands}` : formatStepLine(step);
    })
    .join("\n");

  blocks.push({
    type: "section",
    text: {
      type: "mrkdwn",
      text: clip(`:hammer_and_wrench: *Troubleshooting Checklist*\n${stepsText}`),
    },
  });

  if (checklist.sourceRunbooks.length > 0) {
    blocks.push({
      type: "context",
      elements: [
        {
          type: "mrkdwn",
          text: `:books: Runbooks: ${checklist.sourceRunbooks.join(", ")}`,
        },
      ],
    });
  }

  blocks.push({
    type: "context",
    elements: [
      {
        type: "mrkdwn",
        text: `Alert ID: \`${checklist.alertId}\` • Generated by ${checklist.llmProvider}`,
      },
    ],
  });

  return {
    text: fallbackText,
    blocks,
  };
}

export class SlackDestination implements WebhookDestination {
  private url: string;

  constructor(readonly config: WebhookConfig) {
    if (!config.url) {
      throw new Error(`Slack destination ${config.name} requires a url`);
    }
    this.url = config.url;
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    await postJson(
      this.url,
      formatChecklistMessage(checklist),
      `Slack ${this.config.name}`,
      this.config.headers
    );
  }
}
