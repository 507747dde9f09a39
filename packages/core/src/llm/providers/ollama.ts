import { z } from "zod";
import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
} from "./types";
import { ensureOk } from "../../utils/retry";

export interface OllamaConfig {
  baseUrl?: string;
  model?: string;
}

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
    })
  ),
});

export class OllamaProvider implements LLMProvider {
  readonly name = "ollama";
  readonly model: string;
  private baseUrl: string;

  constructor(config: OllamaConfig = {}) {
    this.baseUrl = (config.baseUrl || "http://localhost:11434").replace(/\/+$/, "");
    this.model = config.model || "llama3.1:8b";
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<string> {
    // Ollama uses OpenAI-compatible API format
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options?.model ?? this.model,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? 0.7,
        max_tokens: options?.maxTokens ?? 2048,
        stream: false,
      }),
    });

    await ensureOk(response, "Ollama");

    const data = ChatCompletionSchema.parse(await response.json());
    return data.choices[0]?.message.content || "";
  }
}
