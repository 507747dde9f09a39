import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
  LLMConfig,
  LLMRetryOptions,
} from "./providers/types";
import { OllamaProvider } from "./providers/ollama";
import { AnthropicProvider } from "./providers/anthropic";
import { BedrockProvider } from "./providers/bedrock";
import { withRetry, type RetryOptions } from "../utils/retry";

export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case "ollama":
      return new OllamaProvider({
        baseUrl: config.ollamaBaseUrl,
        model: config.model,
      });
    case "anthropic":
      if (!config.anthropicApiKey) {
        throw new Error("Anthropic API key is required");
      }
      return new AnthropicProvider({
        apiKey: config.anthropicApiKey,
        model: config.model,
      });
    case "bedrock":
      return new BedrockProvider({
        region: config.bedrockRegion,
        model: config.model,
      });
  }
}

function logRetry(error: unknown, attempt: number, delayMs: number): void {
  console.warn(
    `[LLM] Call failed, retrying (attempt ${attempt}, delay ${delayMs}ms):`,
    error instanceof Error ? error.message : error
  );
}

/**
 * Convert LLM retry options to internal retry options
 */
function toRetryOptions(retryConfig: LLMRetryOptions | false | undefined): RetryOptions {
  if (retryConfig === false) {
    return { maxRetries: 0 };
  }
  if (!retryConfig) {
    return {
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      onRetry: logRetry,
    };
  }
  return {
    ...retryConfig,
    onRetry: retryConfig.onRetry ?? logRetry,
  };
}

export async function complete(
  provider: LLMProvider,
  messages: LLMMessage[],
  options?: LLMCompletionOptions
): Promise<string> {
  return withRetry(
    () => provider.complete(messages, options),
    toRetryOptions(options?.retry)
  );
}

/**
 * Pull a JSON document out of a model reply. Models sometimes wrap JSON in
 * a markdown code block or surround it with prose. Returns undefined when
 * nothing parses.
 */
export function extractJson(response: string): unknown {
  let jsonStr = response.trim();

  const fenced = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  const objectMatch = jsonStr.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    jsonStr = objectMatch[0];
  }

  try {
    return JSON.parse(jsonStr);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}
