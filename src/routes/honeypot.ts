import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { EngagementOrchestrator } from "../core/orchestrator";
import { safeLog, safeStringify, sanitizeHeaders } from "../utils/logging";
import { maskDigits } from "../utils/mask";
import type { Message, Sender } from "../utils/types";
import { requireApiKey } from "./auth";

const SENDERS: Record<string, Sender> = {
  scammer: "counterpart",
  counterpart: "counterpart",
  user: "agent",
  agent: "agent"
};

// Evaluators send epoch millis or ISO strings.
const timestampSchema = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) return Date.now();
    if (typeof value === "number") return value;
    const asNumber = Number(value);
    if (value.trim() !== "" && Number.isFinite(asNumber)) return asNumber;
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "timestamp is not a date" });
      return z.NEVER;
    }
    return parsed;
  });

const messageSchema = z.object({
  sender: z
    .string()
    .default("scammer")
    .transform((value, ctx) => {
      const sender = SENDERS[value.toLowerCase()];
      if (!sender) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown sender "${value}"` });
        return z.NEVER;
      }
      return sender;
    }),
  text: z.string().refine((text) => text.trim().length > 0, "message text is required"),
  timestamp: timestampSchema
});

const turnSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId is required"),
  message: messageSchema,
  conversationHistory: z.array(messageSchema).default([]),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional()
    })
    .default({})
});

function logIncoming(req: Request) {
  safeLog(`[INCOMING] ${req.method} ${req.path} headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
  safeLog(`[INCOMING] body: ${safeStringify(req.body, 2000)}`);
}

function logOutgoing(status: number, responseJson: unknown) {
  safeLog(`[OUTGOING] status: ${status} response_json: ${safeStringify(responseJson, 5000)}`);
}

export function createHoneypotRouter(orchestrator: Pick<EngagementOrchestrator, "handleTurn">, apiKey: string): Router {
  const router = Router();
  const auth = requireApiKey(apiKey);

  const handleTurn = async (req: Request, res: Response, next: NextFunction) => {
    logIncoming(req);

    const parsed = turnSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
      const responseJson = { status: "error", reply: "", detail };
      logOutgoing(400, responseJson);
      return res.status(400).json(responseJson);
    }

    const { sessionId, message, conversationHistory, metadata } = parsed.data;
    const inbound: Message = message;
    safeLog(`[${inbound.sender.toUpperCase()}] ${sessionId}: ${maskDigits(inbound.text)}`);

    let reply: string;
    try {
      ({ reply } = await orchestrator.handleTurn({ sessionId, message: inbound, conversationHistory, metadata }));
    } catch (err) {
      return next(err);
    }
    safeLog(`[HONEYPOT] ${sessionId}: ${reply}`);

    const responseJson = { status: "success", reply };
    logOutgoing(200, responseJson);
    return res.status(200).json(responseJson);
  };

  router.post("/api/honeypot", auth, handleTurn);
  router.post("/chat", auth, handleTurn);
  return router;
}
