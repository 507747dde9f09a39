import { ensureOk } from "../utils/retry";

/**
 * POST a JSON body; 429/5xx reject with RetryableError, other failures
 * with a plain Error
 */
export async function postJson(
  url: string,
  body: unknown,
  label: string,
  headers: Record<string, string> = {}
): Promise<Response> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
    body: JSON.stringify(body),
  });

  return ensureOk(response, label);
}
