import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { EngagementOrchestrator } from "./core/orchestrator";
import type { SessionStore } from "./core/sessionStore";
import { createHoneypotRouter } from "./routes/honeypot";
import { safeWarn } from "./utils/logging";
import { errorReason } from "./utils/types";

export const SERVICE_NAME = "scam-honeypot-engine";
export const SERVICE_VERSION = "1.0.0";

export type AppDeps = {
  orchestrator: Pick<EngagementOrchestrator, "handleTurn">;
  store: Pick<SessionStore, "health">;
  apiKey: string;
};

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ["POST /api/honeypot", "POST /chat", "GET /health"]
    });
  });

  app.get("/health", (_req, res) => {
    res.json(deps.store.health());
  });

  app.use(createHoneypotRouter(deps.orchestrator, deps.apiKey));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isMalformedBody(err)) {
      return res.status(400).json({ status: "error", reply: "", detail: "Malformed JSON body" });
    }
    safeWarn(`[SERVER] unhandled error: ${errorReason(err)}`);
    return res.status(500).json({ status: "error", reply: "", detail: "Internal server error" });
  });

  return app;
}
