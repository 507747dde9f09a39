import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";

/** The parts of an API Gateway event the handlers read */
export type RequestEvent = Pick<APIGatewayProxyEvent, "body" | "isBase64Encoded">;

export function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
    body: JSON.stringify(body),
  };
}

/**
 * Parse a JSON request body; undefined when the body is not JSON
 */
export function parseBody(body: string | null, isBase64Encoded = false): unknown {
  if (!body) return {};
  const text = isBase64Encoded ? Buffer.from(body, "base64").toString("utf-8") : body;
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}
