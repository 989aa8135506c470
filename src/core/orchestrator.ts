import { logEvent, safeLog, safeWarn } from "../utils/logging";
import {
  degraded,
  errorReason,
  type ConversationMetadata,
  type Degradable,
  type IntelligenceFinding,
  type Message,
  type ScamAssessment,
  type Session
} from "../utils/types";
import { describeTactics, type ScamClassifier } from "./classifier";
import { countActionable, extractIntelligence, mergeFindings, summarizeFindings } from "./extractor";
import { STALL_REPLIES, neutralReply, type PersonaAgent } from "./persona";
import { buildReport, type DeliveryOutcome, type Reporter } from "./reporter";
import type { SessionStore } from "./sessionStore";

export type TurnState = "LOADED" | "CLASSIFIED" | "EXTRACTED" | "REPLIED" | "PERSISTED" | "REPORTED";

export type TurnRequest = {
  sessionId: string;
  message: Message;
  conversationHistory: Message[];
  metadata: ConversationMetadata;
};

export type TurnResult = {
  reply: string;
  session: Session;
  state: TurnState;
  report: DeliveryOutcome | null;
};

export type ReportThresholds = {
  minMessagesForCallback: number;
  minIntelligenceItems: number;
};

export type OrchestratorDeps = {
  store: SessionStore;
  classifier: Pick<ScamClassifier, "classify">;
  persona: Pick<PersonaAgent, "generateReply">;
  reporter: Pick<Reporter, "deliver">;
  thresholds: ReportThresholds;
  extract?: (text: string) => IntelligenceFinding[];
  now?: () => number;
};

const NEUTRAL_ASSESSMENT: ScamAssessment = {
  isScam: false,
  confidence: 0,
  category: "none",
  stage: "heuristic",
  signals: []
};

const MAX_NOTES = 8;

export function shouldReport(session: Session, thresholds: ReportThresholds): boolean {
  if (session.reported) return false;
  return (
    session.messageCount >= thresholds.minMessagesForCallback ||
    countActionable(session.intelligence) >= thresholds.minIntelligenceItems
  );
}

function mergeNotes(existing: string, notes: string[]): string {
  const parts = existing
    .split(";")
    .map((part) => part.trim())
    .filter(Boolean);
  for (const note of notes) {
    if (!parts.includes(note)) parts.push(note);
  }
  return parts.slice(-MAX_NOTES).join("; ");
}

async function guard<T>(step: string, run: () => Promise<Degradable<T>>, fallback: T): Promise<Degradable<T>> {
  try {
    return await run();
  } catch (err) {
    safeWarn(`[ORCHESTRATOR] ${step} failed unexpectedly (${errorReason(err)}); using safe default`);
    return degraded(fallback, errorReason(err));
  }
}

/**
 * Runs one inbound message through load → classify → extract → reply → save,
 * then reports the session once it crosses a reporting threshold. Always
 * produces a reply; component failures fall back to their safe defaults.
 */
export class EngagementOrchestrator {
  private readonly extract: (text: string) => IntelligenceFinding[];
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.extract = deps.extract ?? extractIntelligence;
    this.now = deps.now ?? Date.now;
  }

  async handleTurn(request: TurnRequest): Promise<TurnResult> {
    const { store } = this.deps;
    const session = await store.load(request.sessionId);
    let state: TurnState = "LOADED";
    const degradedSteps: string[] = [];

    if (session.history.length === 0 && session.messageCount === 0) {
      this.seedFromCaller(session, request.conversationHistory);
    }
    session.metadata = { ...session.metadata, ...request.metadata };

    const priorHistory = [...session.history];
    session.history.push({ ...request.message });
    const fromCounterpart = request.message.sender === "counterpart";
    if (fromCounterpart) session.messageCount += 1;

    if (fromCounterpart) {
      const classified = await guard(
        "classify",
        () => this.deps.classifier.classify(request.message, priorHistory),
        NEUTRAL_ASSESSMENT
      );
      if (classified.degraded) degradedSteps.push("classify");
      this.recordAssessment(session, classified.value);
    }
    state = "CLASSIFIED";

    if (fromCounterpart) {
      session.intelligence = mergeFindings(session.intelligence, this.safeExtract(request.message.text, degradedSteps));
    }
    state = "EXTRACTED";

    const reply = await this.reply(session, degradedSteps);
    session.history.push({ sender: "agent", text: reply, timestamp: this.now() });
    state = "REPLIED";

    await store.save(session);
    state = "PERSISTED";

    let report: DeliveryOutcome | null = null;
    if (shouldReport(session, this.deps.thresholds)) {
      report = await this.deps.reporter.deliver(buildReport(session));
      session.reported = true;
      session.reportOutcome = report.status;
      await store.save(session);
      state = "REPORTED";
    }

    logEvent("TURN", {
      sessionId: session.sessionId,
      messageCount: session.messageCount,
      scamConfirmed: session.scamConfirmed,
      findings: session.intelligence.length,
      state,
      degraded: degradedSteps,
      report: report?.status ?? null
    });
    if (countActionable(session.intelligence) > 0) {
      safeLog(`[TURN] ${session.sessionId}: ${summarizeFindings(session.intelligence)}`);
    }

    return { reply, session, state, report };
  }

  /** Caller history only seeds a brand-new session; stored history always wins. */
  private seedFromCaller(session: Session, history: Message[]): void {
    for (const message of history) {
      session.history.push({ ...message });
      if (message.sender === "counterpart") {
        session.intelligence = mergeFindings(session.intelligence, this.safeExtract(message.text, []));
      }
    }
  }

  private recordAssessment(session: Session, assessment: ScamAssessment): void {
    if (assessment.isScam) {
      session.scamConfirmed = true;
      session.agentNotes = mergeNotes(session.agentNotes, describeTactics(assessment));
    }
    if (!session.peakAssessment || assessment.confidence > session.peakAssessment.confidence) {
      session.peakAssessment = assessment;
    }
  }

  private safeExtract(text: string, degradedSteps: string[]): IntelligenceFinding[] {
    try {
      return this.extract(text);
    } catch (err) {
      safeWarn(`[ORCHESTRATOR] extract failed unexpectedly (${errorReason(err)}); using empty extraction`);
      degradedSteps.push("extract");
      return [];
    }
  }

  private async reply(session: Session, degradedSteps: string[]): Promise<string> {
    const agentTurns = session.history.filter((m) => m.sender === "agent").length;
    if (!session.scamConfirmed) {
      return neutralReply(`${session.sessionId}:${agentTurns}`);
    }
    const generated = await guard(
      "reply",
      () =>
        this.deps.persona.generateReply({
          sessionId: session.sessionId,
          history: session.history,
          metadata: session.metadata,
          intelligence: session.intelligence
        }),
      STALL_REPLIES[0]
    );
    if (generated.degraded) degradedSteps.push("reply");
    return generated.value;
  }
}
