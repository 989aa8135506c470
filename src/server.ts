import { createApp } from "./app";
import { loadConfig } from "./config";
import { ScamClassifier } from "./core/classifier";
import { EngagementOrchestrator } from "./core/orchestrator";
import { PersonaAgent } from "./core/persona";
import { createLlmClient } from "./core/providers";
import { Reporter } from "./core/reporter";
import { SessionStore } from "./core/sessionStore";
import { SupabaseSessionBackend } from "./core/backends/supabaseBackend";
import { safeLog, safeWarn } from "./utils/logging";
import { errorReason } from "./utils/types";

async function main() {
  const config = loadConfig(process.env);

  const llm = createLlmClient(config.llm);
  if (!llm) {
    safeWarn(`[SERVER] no LLM provider configured (LLM_PROVIDER=${config.llm.provider}); heuristic-only mode`);
  }

  const backend =
    config.supabase.url && config.supabase.serviceRoleKey
      ? SupabaseSessionBackend.fromCredentials(config.supabase.url, config.supabase.serviceRoleKey, config.supabase.timeoutMs)
      : null;
  const store = new SessionStore(backend, { ttlSeconds: config.sessionTtlSeconds });
  await store.connect();

  const orchestrator = new EngagementOrchestrator({
    store,
    classifier: new ScamClassifier(llm, {
      threshold: config.detection.threshold,
      heuristicFloor: config.detection.heuristicFloor,
      timeoutMs: config.llm.timeoutMs
    }),
    persona: new PersonaAgent(llm, { timeoutMs: config.llm.timeoutMs }),
    reporter: new Reporter(config.callback),
    thresholds: config.engagement
  });

  const app = createApp({ orchestrator, store, apiKey: config.apiKey });
  app.listen(config.port, () => {
    safeLog(`Honeypot API listening on port ${config.port} (store: ${store.status()}, llm: ${llm?.name ?? "none"})`);
  });
}

main().catch((err) => {
  console.error(`[SERVER] startup failed: ${errorReason(err)}`);
  process.exit(1);
});
