import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const DEFAULT_CALLBACK_URL = "https://hackathon.guvi.in/api/updateHoneyPotFinalResult";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  API_KEY: z.string().default(""),
  CALLBACK_URL: z.string().url().default(DEFAULT_CALLBACK_URL),
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CALLBACK_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  CALLBACK_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MIN_MESSAGES_FOR_CALLBACK: z.coerce.number().int().min(1).default(5),
  MIN_INTELLIGENCE_ITEMS: z.coerce.number().int().min(1).default(2),
  SCAM_DETECTION_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  HEURISTIC_FLOOR: z.coerce.number().min(0).max(1).default(0.3),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  LLM_PROVIDER: z.enum(["openai", "gemini", "none"]).default("openai"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(2800),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  SUPABASE_URL: z.string().default(""),
  SUPABASE_SERVICE_ROLE_KEY: z.string().default(""),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000)
});

export type AppConfig = {
  port: number;
  apiKey: string;
  callback: {
    url: string;
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
  };
  engagement: {
    minMessagesForCallback: number;
    minIntelligenceItems: number;
  };
  detection: {
    threshold: number;
    heuristicFloor: number;
  };
  sessionTtlSeconds: number;
  llm: {
    provider: "openai" | "gemini" | "none";
    timeoutMs: number;
    openaiApiKey: string;
    openaiModel: string;
    geminiApiKey: string;
    geminiModel: string;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
    timeoutMs: number;
  };
};

export function loadConfig(source: Record<string, string | undefined>): AppConfig {
  // Blank values fall back to defaults, same as an unset variable.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === "string" && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const env = parsed.data;

  return {
    port: env.PORT,
    apiKey: env.API_KEY,
    callback: {
      url: env.CALLBACK_URL,
      timeoutMs: env.CALLBACK_TIMEOUT_MS,
      maxAttempts: env.CALLBACK_MAX_ATTEMPTS,
      baseDelayMs: env.CALLBACK_BASE_DELAY_MS
    },
    engagement: {
      minMessagesForCallback: env.MIN_MESSAGES_FOR_CALLBACK,
      minIntelligenceItems: env.MIN_INTELLIGENCE_ITEMS
    },
    detection: {
      threshold: env.SCAM_DETECTION_CONFIDENCE_THRESHOLD,
      heuristicFloor: env.HEURISTIC_FLOOR
    },
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    llm: {
      provider: env.LLM_PROVIDER,
      timeoutMs: env.LLM_TIMEOUT_MS,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiModel: env.OPENAI_MODEL,
      geminiApiKey: env.GEMINI_API_KEY,
      geminiModel: env.GEMINI_MODEL
    },
    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
      timeoutMs: env.STORE_TIMEOUT_MS
    }
  };
}
