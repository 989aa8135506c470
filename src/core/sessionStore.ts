import { z } from "zod";
import { safeLog, safeWarn } from "../utils/logging";
import { errorReason, type Session } from "../utils/types";
import { MemorySessionBackend } from "./backends/memoryBackend";
import type { SessionBackend } from "./backends/types";

export type StoreStatus = "connected" | "fallback";

export type HealthSignal = {
  status: "healthy" | "degraded";
  store: StoreStatus;
  timestamp: number;
};

export type SessionStoreOptions = {
  ttlSeconds: number;
  now?: () => number;
};

const messageSchema = z.object({
  sender: z.enum(["counterpart", "agent"]),
  text: z.string(),
  timestamp: z.number()
});

const findingSchema = z.object({
  kind: z.enum(["bank_account", "upi_handle", "phone_number", "url", "email", "keyword"]),
  value: z.string(),
  context: z.string().optional()
});

const assessmentSchema = z.object({
  isScam: z.boolean(),
  confidence: z.number(),
  category: z.string(),
  stage: z.enum(["heuristic", "llm"]),
  signals: z.array(z.string()).default([])
});

const storedSessionSchema = z.object({
  sessionId: z.string(),
  history: z.array(messageSchema).default([]),
  intelligence: z.array(findingSchema).default([]),
  messageCount: z.number().int().min(0).default(0),
  scamConfirmed: z.boolean().default(false),
  reported: z.boolean().default(false),
  reportOutcome: z.enum(["delivered", "exhausted", "rejected"]).nullable().default(null),
  peakAssessment: assessmentSchema.nullable().default(null),
  agentNotes: z.string().default(""),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional()
    })
    .default({}),
  createdAt: z.number(),
  lastUpdatedAt: z.number()
});

export function createSession(sessionId: string, timestamp: number): Session {
  return {
    sessionId,
    history: [],
    intelligence: [],
    messageCount: 0,
    scamConfirmed: false,
    reported: false,
    reportOutcome: null,
    peakAssessment: null,
    agentNotes: "",
    metadata: {},
    createdAt: timestamp,
    lastUpdatedAt: timestamp
  };
}

export function sessionKey(sessionId: string): string {
  return `session:${sessionId}`;
}

function hydrate(raw: string, sessionId: string): Session | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = storedSessionSchema.safeParse(json);
  if (!parsed.success || parsed.data.sessionId !== sessionId) return null;
  return parsed.data;
}

/**
 * Owns session persistence. Runs on the external backend while it answers and
 * drops to a process-local map for the rest of the process once it does not.
 * Writes are last-write-wins; there is no cross-request locking.
 */
export class SessionStore {
  private readonly memory: MemorySessionBackend;
  private readonly now: () => number;
  private readonly ttlSeconds: number;
  private mode: StoreStatus;

  constructor(
    private readonly external: SessionBackend | null,
    options: SessionStoreOptions
  ) {
    this.now = options.now ?? Date.now;
    this.ttlSeconds = options.ttlSeconds;
    this.memory = new MemorySessionBackend(this.now);
    this.mode = external ? "connected" : "fallback";
  }

  /** Startup probe; an unreachable backend puts the store in fallback mode. */
  async connect(): Promise<StoreStatus> {
    if (!this.external) {
      safeWarn("[STORE] no external session backend configured; sessions will not survive a restart");
      this.mode = "fallback";
      return this.mode;
    }
    try {
      await this.external.ping();
      this.mode = "connected";
      safeLog(`[STORE] connected to ${this.external.name}`);
    } catch (err) {
      this.enterFallback(err);
    }
    return this.mode;
  }

  status(): StoreStatus {
    return this.mode;
  }

  health(): HealthSignal {
    const store = this.status();
    return {
      status: store === "connected" ? "healthy" : "degraded",
      store,
      timestamp: this.now()
    };
  }

  async load(sessionId: string): Promise<Session> {
    const raw = await this.run((backend) => backend.get(sessionKey(sessionId)));
    if (raw === null) return createSession(sessionId, this.now());

    const session = hydrate(raw, sessionId);
    if (!session) {
      safeWarn(`[STORE] discarding unreadable session ${sessionId}`);
      return createSession(sessionId, this.now());
    }
    return session;
  }

  async save(session: Session): Promise<void> {
    session.lastUpdatedAt = this.now();
    const payload = JSON.stringify(session);
    await this.run((backend) => backend.set(sessionKey(session.sessionId), payload, this.ttlSeconds));
  }

  private async run<T>(operation: (backend: SessionBackend) => Promise<T>): Promise<T> {
    if (this.mode === "connected" && this.external) {
      try {
        return await operation(this.external);
      } catch (err) {
        this.enterFallback(err);
      }
    }
    return operation(this.memory);
  }

  private enterFallback(err: unknown): void {
    this.mode = "fallback";
    safeWarn(
      `[STORE] external backend unavailable (${errorReason(err)}); using in-process storage, sessions will not survive a restart`
    );
  }
}
