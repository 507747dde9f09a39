import type { DynamicChecklist } from "../types/checklist";
import { postJson } from "./http";
import type { WebhookConfig, WebhookDestination } from "./types";

/**
 * Posts the checklist as-is with the configured headers
 */
export class GenericWebhookDestination implements WebhookDestination {
  private url: string;

  constructor(readonly config: WebhookConfig) {
    if (!config.url) {
      throw new Error(`Webhook ${config.name} requires a url`);
    }
    this.url = config.url;
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    await postJson(this.url, checklist, `Webhook ${this.config.name}`, this.config.headers);
  }
}
