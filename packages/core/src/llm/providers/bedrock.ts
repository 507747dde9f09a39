import {
  BedrockRuntimeClient,
  ConverseCommand,
  type Message,
  type ConverseCommandInput,
} from "@aws-sdk/client-bedrock-runtime";
import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
} from "./types";

export interface BedrockConfig {
  region?: string;
  model?: string;
  client?: BedrockRuntimeClient;
}

/**
 * AWS Bedrock provider using the Converse API.
 * Works with Claude, Amazon Nova, Llama, Mistral, and other Bedrock models.
 * Uses AWS SDK credentials from the environment (IAM role in Lambda).
 */
export class BedrockProvider implements LLMProvider {
  readonly name = "bedrock";
  readonly model: string;
  private client: BedrockRuntimeClient;

  constructor(config: BedrockConfig = {}) {
    const region = config.region || "us-east-1";
    // Amazon Nova Pro is available without model agreements
    this.model = config.model || "amazon.nova-pro-v1:0";

    this.client = config.client ?? new BedrockRuntimeClient({ region });
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<string> {
    const systemMessage = messages.find((m) => m.role === "system");
    const nonSystemMessages = messages.filter((m) => m.role !== "system");

    const input: ConverseCommandInput = {
      modelId: options?.model ?? this.model,
      messages: this.convertMessages(nonSystemMessages),
      inferenceConfig: {
        maxTokens: options?.maxTokens ?? 2048,
        temperature: options?.temperature,
      },
    };

    if (systemMessage?.content) {
      input.system = [{ text: systemMessage.content }];
    }

    const command = new ConverseCommand(input);
    const response = await this.client.send(command);

    // Extract text from response
    const content = response.output?.message?.content;
    if (!content || content.length === 0) {
      return "";
    }

    const textBlock = content.find((block) => "text" in block);
    return textBlock && "text" in textBlock ? textBlock.text || "" : "";
  }

  private convertMessages(messages: LLMMessage[]): Message[] {
    return messages.map((msg) => ({
      role: msg.role === "assistant" ? "assistant" : "user",
      content: [{ text: msg.content }],
    }));
  }
}
