import type { APIGatewayProxyResult } from "aws-lambda";
import {
  AlertValidationError,
  PipelineError,
  normalizeAlert,
} from "@runbook-synthesizer/core";
import { getServices } from "../services";
import { json, parseBody, type RequestEvent } from "./response";

/**
 * POST /alerts
 *
 * Accepts a CloudWatch alarm (SNS-wrapped or direct) or a generic alert and
 * returns the generated checklist.
 */
export async function handler(event: RequestEvent): Promise<APIGatewayProxyResult> {
  const payload = parseBody(event.body, event.isBase64Encoded);
  if (payload === undefined) {
    return json(400, { error: "Request body must be JSON" });
  }

  try {
    const alert = normalizeAlert(payload);
    if (!alert) {
      console.log("[AlertsHandler] Ignoring recovery notification");
      return json(202, { status: "ignored", reason: "Recovery (OK) notifications do not produce checklists" });
    }

    const services = await getServices();
    const checklist = await services.pipeline.processAlert(alert);

    // The runtime freezes once the response is returned, so deliveries
    // must finish first. Their failures never change the response.
    await services.pipeline.drain();

    return json(200, checklist);
  } catch (error) {
    if (error instanceof AlertValidationError) {
      return json(400, { error: error.message, issues: error.issues });
    }
    if (error instanceof PipelineError) {
      console.error(`[AlertsHandler] ${error.message}`);
      return json(502, { error: error.message, alertId: error.alertId, stage: error.stage });
    }
    console.error("[AlertsHandler] Error processing alert:", error);
    return json(500, { error: error instanceof Error ? error.message : "Unknown error" });
  }
}
