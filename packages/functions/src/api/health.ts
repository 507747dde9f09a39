import type { APIGatewayProxyResult } from "aws-lambda";
import { getServices } from "../services";
import { json } from "./response";

/**
 * GET /health
 */
export async function handler(): Promise<APIGatewayProxyResult> {
  try {
    const services = await getServices();
    const stats = await services.store.stats();

    return json(200, {
      status: "healthy",
      timestamp: new Date().toISOString(),
      service: "runbook-synthesizer",
      vectorStore: { name: services.store.name, ...stats },
      providers: {
        embeddings: services.embeddings.name,
        llm: services.llm.name,
        storage: services.config.cloudProvider,
      },
      destinations: services.dispatcher.destinationNames,
    });
  } catch (error) {
    console.error("[HealthHandler] Health check failed:", error);
    return json(503, {
      status: "unhealthy",
      timestamp: new Date().toISOString(),
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
