import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ScamClassifier } from "../core/classifier";
import { EngagementOrchestrator, shouldReport, type OrchestratorDeps } from "../core/orchestrator";
import { PersonaAgent, STALL_REPLIES } from "../core/persona";
import type { DeliveryOutcome, FinalReportPayload } from "../core/reporter";
import { SessionStore, createSession } from "../core/sessionStore";
import { setLogMuted } from "../utils/logging";
import { valuesOf } from "../core/extractor";
import type { Message } from "../utils/types";

setLogMuted(true);

const PHISHING = "Your bank account will be blocked today. Verify immediately by clicking http://fake-bank.com";
const THRESHOLDS = { minMessagesForCallback: 5, minIntelligenceItems: 2 };

class RecordingReporter {
  readonly reports: FinalReportPayload[] = [];

  constructor(private readonly outcome: DeliveryOutcome = { status: "delivered", attempts: 1 }) {}

  async deliver(report: FinalReportPayload): Promise<DeliveryOutcome> {
    this.reports.push(report);
    return this.outcome;
  }
}

function setup(overrides: Partial<OrchestratorDeps> = {}) {
  let tick = 1_000;
  const now = () => tick++;
  const store = new SessionStore(null, { ttlSeconds: 60, now });
  const reporter = new RecordingReporter();
  const orchestrator = new EngagementOrchestrator({
    store,
    classifier: new ScamClassifier(null, { threshold: 0.7, heuristicFloor: 0.3, timeoutMs: 50 }),
    persona: new PersonaAgent(null, { timeoutMs: 50 }),
    reporter,
    thresholds: THRESHOLDS,
    now,
    ...overrides
  });
  return { orchestrator, store, reporter };
}

function counterpart(text: string): Message {
  return { sender: "counterpart", text, timestamp: 1 };
}

function turn(sessionId: string, text: string, conversationHistory: Message[] = []) {
  return { sessionId, message: counterpart(text), conversationHistory, metadata: {} };
}

describe("EngagementOrchestrator", () => {
  it("engages a fresh phishing session without reporting yet", async () => {
    const { orchestrator, reporter } = setup();
    const { reply, session, state, report } = await orchestrator.handleTurn(turn("e2e", PHISHING));

    assert.equal(session.scamConfirmed, true);
    assert.deepEqual(valuesOf(session.intelligence, "url"), ["http://fake-bank.com"]);
    assert.equal(session.messageCount, 1);
    assert.ok(reply.length > 0);
    assert.equal(state, "PERSISTED");
    assert.equal(report, null);
    assert.equal(reporter.reports.length, 0);
    assert.equal(session.agentNotes, "Used urgency tactics; Employed threats; Verification/authentication attempt; Banking/financial pretext; Shared suspicious links");
  });

  it("persists the turn and the reply", async () => {
    const { orchestrator, store } = setup();
    const { reply } = await orchestrator.handleTurn(turn("persist", PHISHING));
    const stored = await store.load("persist");
    assert.deepEqual(
      stored.history.map((m) => [m.sender, m.text]),
      [
        ["counterpart", PHISHING],
        ["agent", reply]
      ]
    );
  });

  it("reports exactly once, on the fifth counterpart message", async () => {
    const { orchestrator, reporter } = setup();
    const states: string[] = [];
    for (let i = 1; i <= 6; i += 1) {
      const result = await orchestrator.handleTurn(turn("count", `hello there ${i}`));
      states.push(result.state);
      assert.equal(result.session.messageCount, i);
    }
    assert.deepEqual(states, ["PERSISTED", "PERSISTED", "PERSISTED", "PERSISTED", "REPORTED", "PERSISTED"]);
    assert.equal(reporter.reports.length, 1);
    assert.equal(reporter.reports[0].totalMessagesExchanged, 5);
  });

  it("reports once enough actionable intelligence is in", async () => {
    const { orchestrator, reporter } = setup();
    const { session } = await orchestrator.handleTurn(turn("intel", "Pay to fraud@okaxis or call 9876543210"));
    assert.equal(reporter.reports.length, 1);
    assert.deepEqual(reporter.reports[0].extractedIntelligence.upiIds, ["fraud@okaxis"]);
    assert.deepEqual(reporter.reports[0].extractedIntelligence.phoneNumbers, ["9876543210"]);
    assert.equal(session.reported, true);
    assert.equal(session.reportOutcome, "delivered");
  });

  it("marks the session reported even when delivery is exhausted", async () => {
    const reporter = new RecordingReporter({ status: "exhausted", attempts: 3, lastError: "status 503" });
    const { orchestrator, store } = setup({ reporter });
    await orchestrator.handleTurn(turn("gave-up", "Pay to fraud@okaxis or call 9876543210"));
    const stored = await store.load("gave-up");
    assert.equal(stored.reported, true);
    assert.equal(stored.reportOutcome, "exhausted");

    await orchestrator.handleTurn(turn("gave-up", "did you pay?"));
    assert.equal(reporter.reports.length, 1);
  });

  it("keeps the scam flag once set", async () => {
    const { orchestrator } = setup();
    await orchestrator.handleTurn(turn("sticky", PHISHING));
    const { session, reply } = await orchestrator.handleTurn(turn("sticky", "ok thanks"));
    assert.equal(session.scamConfirmed, true);
    assert.equal(session.peakAssessment?.confidence, 1);
    assert.ok(!["Sorry, who is this?", "Hi, I think you have the wrong number?", "Ok. What is this about?"].includes(reply));
  });

  it("does not duplicate repeated findings", async () => {
    const { orchestrator } = setup();
    await orchestrator.handleTurn(turn("dupe", "open http://fake-bank.com"));
    const { session } = await orchestrator.handleTurn(turn("dupe", "I said open http://fake-bank.com"));
    assert.equal(valuesOf(session.intelligence, "url").length, 1);
    assert.equal(session.messageCount, 2);
  });

  it("seeds a new session from caller history only once", async () => {
    const { orchestrator } = setup();
    const seed: Message[] = [counterpart("call me on 9876543210"), { sender: "agent", text: "who is this?", timestamp: 1 }];
    const first = await orchestrator.handleTurn(turn("seeded", "hello?", seed));
    assert.equal(first.session.history.length, 4);
    assert.equal(first.session.messageCount, 1);
    assert.deepEqual(valuesOf(first.session.intelligence, "phone_number"), ["9876543210"]);

    const second = await orchestrator.handleTurn(turn("seeded", "hello again", [counterpart("pay to other@ybl")]));
    assert.equal(second.session.history.length, 6);
    assert.deepEqual(valuesOf(second.session.intelligence, "upi_handle"), []);
  });

  it("records agent-side inbound messages without counting them", async () => {
    const { orchestrator } = setup();
    const { session } = await orchestrator.handleTurn({
      sessionId: "agent-side",
      message: { sender: "agent", text: "call 9876543210", timestamp: 1 },
      conversationHistory: [],
      metadata: {}
    });
    assert.equal(session.messageCount, 0);
    assert.deepEqual(session.intelligence, []);
    assert.equal(session.history.length, 2);
  });

  it("replies even when components throw", async () => {
    const { orchestrator } = setup({
      classifier: {
        classify: async () => {
          throw new Error("classifier exploded");
        }
      },
      extract: () => {
        throw new Error("extractor exploded");
      }
    });
    const { reply, session } = await orchestrator.handleTurn(turn("broken", PHISHING));
    assert.ok(["Sorry, who is this?", "Hi, I think you have the wrong number?", "Ok. What is this about?"].includes(reply));
    assert.equal(session.scamConfirmed, false);
    assert.deepEqual(session.intelligence, []);
    assert.equal(session.messageCount, 1);
  });

  it("stalls when the persona throws", async () => {
    const { orchestrator } = setup({
      persona: {
        generateReply: async () => {
          throw new Error("persona exploded");
        }
      }
    });
    const { reply } = await orchestrator.handleTurn(turn("stall", PHISHING));
    assert.equal(reply, STALL_REPLIES[0]);
  });
});

describe("shouldReport", () => {
  it("ignores keywords and already-reported sessions", () => {
    const session = createSession("t", 1);
    session.intelligence = [
      { kind: "keyword", value: "otp" },
      { kind: "keyword", value: "urgent" },
      { kind: "url", value: "http://fake-bank.com" }
    ];
    assert.equal(shouldReport(session, THRESHOLDS), false);
    session.messageCount = 5;
    assert.equal(shouldReport(session, THRESHOLDS), true);
    session.reported = true;
    assert.equal(shouldReport(session, THRESHOLDS), false);
  });
});
