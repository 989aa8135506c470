import type { AppConfig } from "../../config";
import { createGeminiClient } from "./geminiClient";
import { createOpenAIClient } from "./openaiClient";
import type { LlmClient } from "./llm";

export type { LlmClient, LlmRequest } from "./llm";
export { extractJson, withTimeout } from "./llm";

/** Returns null when the selected provider has no credentials. */
export function createLlmClient(llm: AppConfig["llm"]): LlmClient | null {
  if (llm.provider === "openai" && llm.openaiApiKey) {
    return createOpenAIClient(llm.openaiApiKey, llm.openaiModel);
  }
  if (llm.provider === "gemini" && llm.geminiApiKey) {
    return createGeminiClient(llm.geminiApiKey, llm.geminiModel);
  }
  return null;
}
