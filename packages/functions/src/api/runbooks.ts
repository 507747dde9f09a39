import type { APIGatewayProxyResult } from "aws-lambda";
import { z } from "zod";
import { IngestionError } from "@runbook-synthesizer/core";
import { getServices } from "../services";
import { json, parseBody, type RequestEvent } from "./response";

const SyncRequestSchema = z.object({
  path: z.string().trim().min(1).optional(),
});

/**
 * POST /runbooks/sync
 *
 * `{ "path": "runbooks/memory/high-memory.md" }` re-ingests one runbook;
 * `{}` re-ingests everything under the configured prefix.
 */
export async function sync(event: RequestEvent): Promise<APIGatewayProxyResult> {
  const request = SyncRequestSchema.safeParse(parseBody(event.body, event.isBase64Encoded));
  if (!request.success) {
    return json(400, {
      error: "Invalid sync request",
      issues: request.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
    });
  }

  try {
    const services = await getServices();

    if (request.data.path) {
      const result = await services.ingestion.ingestOne(request.data.path);
      return json(200, {
        documentsProcessed: 1,
        documentsFailed: 0,
        chunksStored: result.chunksStored,
        chunksFailed: result.chunksFailed,
      });
    }

    const result = await services.ingestion.ingestAll(services.runbookPrefix);
    return json(200, result);
  } catch (error) {
    if (error instanceof IngestionError) {
      return json(422, { error: error.message, path: error.path });
    }
    console.error("[RunbooksHandler] Sync failed:", error);
    return json(500, { error: error instanceof Error ? error.message : "Unknown error" });
  }
}
