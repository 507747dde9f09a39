/**
 * Webhook destination config from YAML:
 *
 *   webhooks:
 *     - name: oncall-slack
 *       type: slack
 *       url: https://hooks.slack.com/services/...
 *       filter:
 *         severities: [CRITICAL]
 *
 * String values may reference environment variables as ${VAR}.
 */

import fs from "fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { AlertSeveritySchema } from "../types/alert";
import { ConfigError } from "../types/errors";
import type { WebhookConfig } from "./types";

export const WebhookFilterSchema = z.object({
  severities: z.array(AlertSeveritySchema).optional(),
  requiredLabels: z.record(z.string(), z.string()).optional(),
});

export const WebhookConfigSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["generic", "slack", "teams", "pagerduty", "email", "file"]),
    url: z.string().min(1).optional(),
    enabled: z.boolean().default(true),
    headers: z.record(z.string(), z.string()).default({}),
    filter: WebhookFilterSchema.default({}),
    retryCount: z.number().int().min(0).default(2),
    retryDelayMs: z.number().int().min(0).default(1000),
    routingKey: z.string().min(1).optional(),
    to: z
      .union([z.string().min(1), z.array(z.string().min(1))])
      .transform((value) => (Array.isArray(value) ? value : [value]))
      .optional(),
    from: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    const needsUrl = ["generic", "slack", "teams", "file"].includes(config.type);
    if (needsUrl && !config.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["url"], message: `required for ${config.type}` });
    }
    if (config.type === "pagerduty" && !config.routingKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["routingKey"], message: "required for pagerduty" });
    }
    if (config.type === "email" && (!config.to || !config.from)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["to"], message: "to and from are required for email" });
    }
  });

const WebhookFileSchema = z.object({
  webhooks: z.array(WebhookConfigSchema).default([]),
});

/**
 * Resolve ${VAR} references in every string of a parsed YAML document.
 * An unset variable is an error.
 */
export function resolveEnvReferences(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} referenced in webhook config is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvReferences(item, env)])
    );
  }
  return value;
}

export function parseWebhookConfig(
  content: string,
  source = "webhook config",
  env: NodeJS.ProcessEnv = process.env
): WebhookConfig[] {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = WebhookFileSchema.safeParse(resolveEnvReferences(raw ?? {}, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}`, issues);
  }

  const names = new Set<string>();
  for (const webhook of result.data.webhooks) {
    if (names.has(webhook.name)) {
      throw new ConfigError(`Invalid ${source}`, [`duplicate webhook name: ${webhook.name}`]);
    }
    names.add(webhook.name);
  }

  return result.data.webhooks;
}

export async function loadWebhookConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<WebhookConfig[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return parseWebhookConfig(content, filePath, env);
}
