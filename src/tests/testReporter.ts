import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Reporter, buildReport, type FinalReportPayload, type ReportTransport } from "../core/reporter";
import { createSession } from "../core/sessionStore";
import { setLogMuted } from "../utils/logging";

setLogMuted(true);

/** Plays back one scripted step per attempt: a status code or a thrown error. */
function scriptedTransport(steps: Array<number | Error>) {
  const calls: Array<{ url: string; timeoutMs: number; payload: FinalReportPayload }> = [];
  const transport: ReportTransport = async (url, payload, timeoutMs) => {
    calls.push({ url, timeoutMs, payload });
    const step = steps[Math.min(calls.length - 1, steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  };
  return { transport, calls };
}

function reporterWith(steps: Array<number | Error>, maxAttempts = 3) {
  const { transport, calls } = scriptedTransport(steps);
  const sleeps: number[] = [];
  const reporter = new Reporter({
    url: "http://evaluator.test/report",
    timeoutMs: 5000,
    maxAttempts,
    baseDelayMs: 100,
    transport,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });
  return { reporter, calls, sleeps };
}

const report = buildReport(createSession("s-report", 1));

describe("Reporter", () => {
  it("delivers after two failures with growing delays", async () => {
    const { reporter, calls, sleeps } = reporterWith([503, new Error("socket hang up"), 200]);
    const outcome = await reporter.deliver(report);
    assert.deepEqual(outcome, { status: "delivered", attempts: 3 });
    assert.equal(calls.length, 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it("gives up at the attempt ceiling", async () => {
    const { reporter, calls, sleeps } = reporterWith([new Error("timeout of 5000ms exceeded")]);
    const outcome = await reporter.deliver(report);
    assert.deepEqual(outcome, { status: "exhausted", attempts: 3, lastError: "timeout of 5000ms exceeded" });
    assert.equal(calls.length, 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it("respects a different ceiling", async () => {
    const { reporter, calls, sleeps } = reporterWith([500], 5);
    const outcome = await reporter.deliver(report);
    assert.equal(outcome.status, "exhausted");
    assert.equal(calls.length, 5);
    assert.deepEqual(sleeps, [100, 200, 400, 800]);
  });

  it("retries on 429", async () => {
    const { reporter, sleeps } = reporterWith([429, 202]);
    assert.deepEqual(await reporter.deliver(report), { status: "delivered", attempts: 2 });
    assert.deepEqual(sleeps, [100]);
  });

  it("stops at once on other client errors", async () => {
    const { reporter, calls, sleeps } = reporterWith([400]);
    assert.deepEqual(await reporter.deliver(report), { status: "rejected", attempts: 1, lastError: "status 400" });
    assert.equal(calls.length, 1);
    assert.deepEqual(sleeps, []);
  });

  it("posts to the configured url with the per-attempt timeout", async () => {
    const { reporter, calls } = reporterWith([200]);
    await reporter.deliver(report);
    assert.equal(calls[0].url, "http://evaluator.test/report");
    assert.equal(calls[0].timeoutMs, 5000);
    assert.equal(calls[0].payload.sessionId, "s-report");
  });
});

describe("buildReport", () => {
  it("maps the session to the evaluator payload", () => {
    const session = createSession("s-42", 1);
    session.scamConfirmed = true;
    session.messageCount = 5;
    session.agentNotes = "Used urgency tactics; Shared suspicious links";
    session.peakAssessment = {
      isScam: true,
      confidence: 0.92,
      category: "banking_phishing",
      stage: "llm",
      signals: ["urgency", "link"]
    };
    session.intelligence = [
      { kind: "url", value: "http://fake-bank.com" },
      { kind: "upi_handle", value: "pramod@paytm" },
      { kind: "phone_number", value: "+919876543210" },
      { kind: "bank_account", value: "12345678901234" },
      { kind: "email", value: "help@fake-bank.in" },
      { kind: "keyword", value: "urgent" }
    ];

    assert.deepEqual(buildReport(session), {
      sessionId: "s-42",
      scamDetected: true,
      totalMessagesExchanged: 5,
      extractedIntelligence: {
        bankAccounts: ["12345678901234"],
        upiIds: ["pramod@paytm"],
        phishingLinks: ["http://fake-bank.com"],
        phoneNumbers: ["+919876543210"],
        emailAddresses: ["help@fake-bank.in"],
        suspiciousKeywords: ["urgent"]
      },
      classification: { confidence: 0.92, category: "banking_phishing", stage: "llm" },
      agentNotes: "Used urgency tactics; Shared suspicious links"
    });
  });

  it("fills defaults for a quiet session", () => {
    const payload = buildReport(createSession("s-0", 1));
    assert.deepEqual(payload.classification, { confidence: 0, category: "none", stage: "none" });
    assert.equal(payload.agentNotes, "Scam engagement completed");
  });
});
