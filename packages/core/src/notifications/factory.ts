import type { Resend } from "resend";
import { EmailDestination } from "./email";
import { FileOutputDestination } from "./file-output";
import { GenericWebhookDestination } from "./generic";
import { PagerDutyDestination } from "./pagerduty";
import { SlackDestination } from "./slack";
import { TeamsDestination } from "./teams";
import type { WebhookConfig, WebhookDestination } from "./types";

export interface DestinationDependencies {
  resendApiKey?: string;
  resendClient?: Resend;
}

export function createDestination(
  config: WebhookConfig,
  deps: DestinationDependencies = {}
): WebhookDestination {
  switch (config.type) {
    case "generic":
      return new GenericWebhookDestination(config);
    case "slack":
      return new SlackDestination(config);
    case "teams":
      return new TeamsDestination(config);
    case "pagerduty":
      return new PagerDutyDestination(config);
    case "email":
      return new EmailDestination(config, {
        apiKey: deps.resendApiKey,
        client: deps.resendClient,
      });
    case "file":
      return new FileOutputDestination(config);
  }
}

/**
 * Config for the file destination added when CHECKLIST_OUTPUT_DIR is set
 */
export function fileOutputConfig(outputDir: string): WebhookConfig {
  return {
    name: "file-output",
    type: "file",
    url: outputDir,
    enabled: true,
    headers: {},
    filter: {},
    retryCount: 0,
    retryDelayMs: 0,
  };
}
