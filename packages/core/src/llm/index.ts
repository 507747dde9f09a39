export * from "./providers/types";
export * from "./providers/ollama";
export * from "./providers/anthropic";
export * from "./providers/bedrock";
export * from "./client";
export * from "./prompts/checklist";
