export type Sender = "counterpart" | "agent";

export type Message = {
  sender: Sender;
  text: string;
  timestamp: number;
};

export type ConversationMetadata = {
  channel?: string;
  language?: string;
  locale?: string;
};

export type FindingKind =
  | "bank_account"
  | "upi_handle"
  | "phone_number"
  | "url"
  | "email"
  | "keyword";

export type IntelligenceFinding = {
  kind: FindingKind;
  value: string;
  context?: string;
};

export type AssessmentStage = "heuristic" | "llm";

export type ScamAssessment = {
  isScam: boolean;
  confidence: number;
  category: string;
  stage: AssessmentStage;
  signals: string[];
};

export type ReportOutcome = "delivered" | "exhausted" | "rejected";

export type Session = {
  sessionId: string;
  history: Message[];
  intelligence: IntelligenceFinding[];
  messageCount: number;
  scamConfirmed: boolean;
  reported: boolean;
  reportOutcome: ReportOutcome | null;
  peakAssessment: ScamAssessment | null;
  agentNotes: string;
  metadata: ConversationMetadata;
  createdAt: number;
  lastUpdatedAt: number;
};

/**
 * A component result that may have come from its fallback path.
 * `value` is always usable; `reason` says why the primary path was skipped.
 */
export type Degradable<T> =
  | { degraded: false; value: T }
  | { degraded: true; value: T; reason: string };

export function primary<T>(value: T): Degradable<T> {
  return { degraded: false, value };
}

export function degraded<T>(value: T, reason: string): Degradable<T> {
  return { degraded: true, value, reason };
}

export function errorReason(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
