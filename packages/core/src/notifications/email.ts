import { Resend } from "resend";
import type { DynamicChecklist } from "../types/checklist";
import { RetryableError } from "../utils/retry";
import { escapeHtml, formatStepLine, getPriorityLabel, getSeverityEmoji } from "./format";
import type { WebhookConfig, WebhookDestination } from "./types";

export interface EmailDestinationOptions {
  /** Resend API key, used when no client is given */
  apiKey?: string;
  client?: Resend;
}

function formatHtmlEmail(checklist: DynamicChecklist): string {
  const emoji = getSeverityEmoji(checklist.severity);
  const severityColor =
    checklist.severity === "CRITICAL"
      ? "#dc2626"
      : checklist.severity === "WARNING"
        ? "#ca8a04"
        : "#2563eb";

  const stepsHtml = checklist.steps
    .map((step) => {
      const commands = step.commands
        .map((command) => `<pre style="margin: 4px 0; background: #f3f4f6; padding: 6px;">${escapeHtml(command)}</pre>`)
        .join("");
      return `<li style="margin-bottom: 8px;"><strong>${getPriorityLabel(step.priority)}</strong> ${escapeHtml(step.description)}${commands}</li>`;
    })
    .join("");

  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <div style="border-left: 4px solid ${severityColor}; padding-left: 16px; margin-bottom: 20px;">
    <h1 style="margin: 0 0 8px 0; font-size: 20px;">
      ${emoji} ${escapeHtml(checklist.alertTitle)}
    </h1>
    <p style="margin: 0; color: #666; font-size: 14px;">
      <strong>Severity:</strong> <span style="color: ${severityColor};">${checklist.severity}</span>
    </p>
  </div>

  ${
    checklist.summary
      ? `
  <div style="background: #f8f9fa; border-radius: 8px; padding: 16px; margin-bottom: 20px;">
    <h2 style="margin: 0 0 8px 0; font-size: 14px; color: #666; text-transform: uppercase;">Summary</h2>
    <p style="margin: 0;">${escapeHtml(checklist.summary)}</p>
  </div>
  `
      : ""
  }

  <div style="margin-bottom: 20px;">
    <h2 style="margin: 0 0 12px 0; font-size: 14px; color: #666; text-transform: uppercase;">Troubleshooting Checklist</h2>
    <ol style="margin: 0; padding-left: 20px;">
      ${stepsHtml}
    </ol>
  </div>

  <div style="margin-top: 24px; padding-top: 16px; border-top: 1px solid #e5e7eb; font-size: 12px; color: #999;">
    <p style="margin: 0;">Alert ID: ${escapeHtml(checklist.alertId)}</p>
    ${
      checklist.sourceRunbooks.length > 0
        ? `<p style="margin: 4px 0 0 0;">Runbooks: ${checklist.sourceRunbooks.map(escapeHtml).join(", ")}</p>`
        : ""
    }
  </div>
</body>
</html>
  `.trim();
}

export function formatTextEmail(checklist: DynamicChecklist): string {
  const emoji = getSeverityEmoji(checklist.severity);
  const steps = checklist.steps
    .map((step) => [formatStepLine(step), ...step.commands.map((command) => `   $ ${command}`)].join("\n"))
    .join("\n");

  return `
${emoji} ${checklist.alertTitle}
${"=".repeat(50)}

Severity: ${checklist.severity}

${checklist.summary ? `SUMMARY\n${checklist.summary}\n` : ""}
TROUBLESHOOTING CHECKLIST
${steps}

---
Alert ID: ${checklist.alertId}
${checklist.sourceRunbooks.length > 0 ? `Runbooks: ${checklist.sourceRunbooks.join(", ")}` : ""}
  `.trim();
}

export class EmailDestination implements WebhookDestination {
  private client: Resend;
  private to: string[];
  private from: string;

  constructor(
    readonly config: WebhookConfig,
    options: EmailDestinationOptions = {}
  ) {
    if (!config.to || config.to.length === 0 || !config.from) {
      throw new Error(`Email destination ${config.name} requires to and from`);
    }
    this.to = config.to;
    this.from = config.from;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new Resend(options.apiKey);
    } else {
      throw new Error(`Email destination ${config.name} requires RESEND_API_KEY`);
    }
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    const emoji = getSeverityEmoji(checklist.severity);
    const subject = `${emoji} [${checklist.severity}] Checklist: ${checklist.alertTitle}`;

    const { error } = await this.client.emails.send({
      from: this.from,
      to: this.to,
      subject,
      html: formatHtmlEmail(checklist),
      text: formatTextEmail(checklist),
    });

    if (error) {
      if (error.name === "internal_server_error" || error.name === "application_error") {
        throw new RetryableError(`Failed to send email: ${error.message}`, 500);
      }
      throw new Error(`Failed to send email: ${error.message}`);
    }
  }
}
