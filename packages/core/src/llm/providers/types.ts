export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Callback fired before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface LLMCompletionOptions {
  /** Overrides the provider's configured model for this call */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Retry configuration (enabled by default) */
  retry?: LLMRetryOptions | false;
}

export interface LLMProvider {
  /** Provider id, e.g. "ollama" */
  readonly name: string;
  readonly model: string;

  complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<string>;
}

export type LLMProviderType = "ollama" | "anthropic" | "bedrock";

export interface LLMConfig {
  provider: LLMProviderType;
  model?: string;
  // Ollama config
  ollamaBaseUrl?: string;
  // Anthropic config
  anthropicApiKey?: string;
  // Bedrock config
  bedrockRegion?: string;
}
