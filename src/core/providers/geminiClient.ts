import { GoogleGenerativeAI } from "@google/generative-ai";
import { withTimeout, type LlmClient, type LlmRequest } from "./llm";

export function createGeminiClient(apiKey: string, modelName: string): LlmClient {
  const client = new GoogleGenerativeAI(apiKey);

  return {
    name: `gemini:${modelName}`,
    async complete(request: LlmRequest): Promise<string> {
      const model = client.getGenerativeModel({
        model: modelName,
        systemInstruction: request.system,
        generationConfig: {
          maxOutputTokens: request.maxOutputTokens,
          temperature: request.temperature,
          ...(request.json ? { responseMimeType: "application/json" } : {})
        }
      });
      const result = await withTimeout(model.generateContent(request.user), request.timeoutMs, "Gemini");
      const text = result.response.text().trim();
      if (!text) throw new Error("Gemini returned an empty response");
      return text;
    }
  };
}
