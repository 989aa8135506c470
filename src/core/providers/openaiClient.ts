import OpenAI from "openai";
import type { LlmClient, LlmRequest } from "./llm";

export function createOpenAIClient(apiKey: string, model: string): LlmClient {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  return {
    name: `openai:${model}`,
    async complete(request: LlmRequest): Promise<string> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), request.timeoutMs);
      try {
        const response = await client.responses.create(
          {
            model,
            input: [
              { role: "system", content: request.system },
              { role: "user", content: request.user }
            ],
            max_output_tokens: request.maxOutputTokens,
            temperature: request.temperature,
            ...(request.json ? { text: { format: { type: "json_object" as const } } } : {})
          },
          { signal: controller.signal, timeout: request.timeoutMs }
        );
        const text = response.output_text?.trim() || "";
        if (!text) throw new Error("OpenAI returned an empty response");
        return text;
      } finally {
        clearTimeout(timer);
      }
    }
  };
}
