import axios from "axios";
import { safeLog, safeWarn } from "../utils/logging";
import { errorReason, type ReportOutcome, type Session } from "../utils/types";
import { valuesOf } from "./extractor";

export type FinalReportPayload = {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: {
    bankAccounts: string[];
    upiIds: string[];
    phishingLinks: string[];
    phoneNumbers: string[];
    emailAddresses: string[];
    suspiciousKeywords: string[];
  };
  classification: {
    confidence: number;
    category: string;
    stage: "heuristic" | "llm" | "none";
  };
  agentNotes: string;
};

export type DeliveryOutcome = {
  status: ReportOutcome;
  attempts: number;
  lastError?: string;
};

/** One POST; resolves with the HTTP status, rejects on network failure or timeout. */
export type ReportTransport = (url: string, payload: FinalReportPayload, timeoutMs: number) => Promise<number>;

export type ReporterOptions = {
  url: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  transport?: ReportTransport;
  sleep?: (ms: number) => Promise<void>;
};

export const axiosTransport: ReportTransport = async (url, payload, timeoutMs) => {
  const response = await axios.post(url, payload, {
    timeout: timeoutMs,
    headers: { "Content-Type": "application/json" },
    validateStatus: () => true
  });
  return response.status;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function buildReport(session: Session): FinalReportPayload {
  const peak = session.peakAssessment;
  return {
    sessionId: session.sessionId,
    scamDetected: session.scamConfirmed,
    totalMessagesExchanged: session.messageCount,
    extractedIntelligence: {
      bankAccounts: valuesOf(session.intelligence, "bank_account"),
      upiIds: valuesOf(session.intelligence, "upi_handle"),
      phishingLinks: valuesOf(session.intelligence, "url"),
      phoneNumbers: valuesOf(session.intelligence, "phone_number"),
      emailAddresses: valuesOf(session.intelligence, "email"),
      suspiciousKeywords: valuesOf(session.intelligence, "keyword")
    },
    classification: {
      confidence: peak?.confidence ?? 0,
      category: peak?.category ?? "none",
      stage: peak?.stage ?? "none"
    },
    agentNotes: session.agentNotes || "Scam engagement completed"
  };
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Delivers the final report with bounded retries. Transient failures
 * (network, timeout, 429, 5xx) back off exponentially; any other 4xx is final.
 * Never throws.
 */
export class Reporter {
  private readonly transport: ReportTransport;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ReporterOptions) {
    this.transport = options.transport ?? axiosTransport;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async deliver(report: FinalReportPayload): Promise<DeliveryOutcome> {
    const { maxAttempts, baseDelayMs, url, timeoutMs } = this.options;
    let lastError = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const status = await this.transport(url, report, timeoutMs);
        if (status >= 200 && status < 300) {
          safeLog(`[REPORTER] delivered report for ${report.sessionId} (attempt ${attempt}/${maxAttempts})`);
          return { status: "delivered", attempts: attempt };
        }
        lastError = `status ${status}`;
        if (!isRetryableStatus(status)) {
          safeWarn(`[REPORTER] report for ${report.sessionId} rejected with ${lastError}; not retrying`);
          return { status: "rejected", attempts: attempt, lastError };
        }
      } catch (err) {
        lastError = errorReason(err);
      }

      if (attempt < maxAttempts) {
        const delay = baseDelayMs * 2 ** (attempt - 1);
        safeWarn(
          `[REPORTER] attempt ${attempt}/${maxAttempts} for ${report.sessionId} failed (${lastError}); retrying in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }

    safeWarn(`[REPORTER] giving up on ${report.sessionId} after ${maxAttempts} attempts (${lastError})`);
    return { status: "exhausted", attempts: maxAttempts, lastError };
  }
}
