import { z } from "zod";

export const AlertSeveritySchema = z.enum(["INFO", "WARNING", "CRITICAL"]);

export const AlertSchema = z.object({
  id: z.string().min(1, "alert id must not be empty"),
  title: z.string(),
  message: z.string(),
  severity: AlertSeveritySchema,
  sourceService: z.string(),
  dimensions: z.record(z.string(), z.string()).default({}),
  labels: z.record(z.string(), z.string()).default({}),
  timestamp: z.string().datetime({ offset: true }),
  rawPayload: z.string().optional(),
});

export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;
export type Alert = z.infer<typeof AlertSchema>;

/**
 * Dimension keys that identify the alarming resource, in lookup order.
 */
export const RESOURCE_ID_DIMENSIONS = [
  "resourceId",
  "instanceId",
  "InstanceId",
  "resource_id",
] as const;

export function extractResourceId(alert: Alert): string | undefined {
  for (const key of RESOURCE_ID_DIMENSIONS) {
    const value = alert.dimensions[key];
    if (value && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}
