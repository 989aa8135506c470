import { z } from "zod";
import { clamp01, round2 } from "../utils/mask";
import { logEvent, safeWarn } from "../utils/logging";
import {
  degraded,
  errorReason,
  primary,
  type Degradable,
  type Message,
  type ScamAssessment
} from "../utils/types";
import { extractJson, type LlmClient } from "./providers";
import { normalizeText } from "./extractor";

export type ClassifierOptions = {
  threshold: number;
  heuristicFloor: number;
  timeoutMs: number;
  historyWindow?: number;
};

type HeuristicSignal = {
  name: string;
  weight: number;
  test: (lower: string) => boolean;
};

const LINK = /https?:\/\/|\bwww\./;

const SIGNALS: HeuristicSignal[] = [
  {
    name: "urgency",
    weight: 0.2,
    test: (t) => /\b(urgent|urgently|immediately|asap|hurry|right now|last chance|expire[sd]?|today|within \d+)\b/.test(t)
  },
  {
    name: "threat",
    weight: 0.25,
    test: (t) => /\b(blocked|block|suspended|suspend|locked|frozen|deactivated|legal action|police|arrest|penalty|court)\b/.test(t)
  },
  {
    name: "credential",
    weight: 0.3,
    test: (t) => /\b(otp|pin|cvv|password|passcode)\b/.test(t)
  },
  {
    name: "financial",
    weight: 0.15,
    test: (t) => /\b(pay|payment|transfer|send money|deposit|fee|refund|upi)\b/.test(t)
  },
  {
    name: "verification",
    weight: 0.15,
    test: (t) => /\b(verify|verification|kyc|confirm|update (your )?details|re-?activate)\b/.test(t)
  },
  {
    name: "reward",
    weight: 0.2,
    test: (t) => /\b(won|winner|prize|lottery|cashback|reward|congratulations|selected)\b/.test(t)
  },
  {
    name: "banking",
    weight: 0.1,
    test: (t) => /\b(bank|account|card|atm|netbanking|debit|credit)\b/.test(t)
  },
  {
    name: "link",
    weight: 0.1,
    test: (t) => LINK.test(t)
  },
  {
    name: "link_with_action",
    weight: 0.2,
    test: (t) => LINK.test(t) && /\b(click|tap|open|visit|login|log in|sign in|verify)/.test(t)
  },
  {
    name: "amount_with_deadline",
    weight: 0.2,
    test: (t) =>
      /(\brs\.?|\binr|₹|\$)\s?\d[\d,]*/.test(t) &&
      /\b(today|tonight|within|before|deadline|\d+\s*(hours?|hrs?|minutes?|mins?))\b/.test(t)
  }
];

export type HeuristicScore = {
  confidence: number;
  signals: string[];
  category: string;
};

function categorize(signals: Set<string>, confidence: number): string {
  if (signals.has("credential")) return "credential_phishing";
  if (signals.has("link") && (signals.has("banking") || signals.has("threat") || signals.has("verification"))) {
    return "banking_phishing";
  }
  if (signals.has("reward")) return "reward_scam";
  if (signals.has("financial")) return "payment_fraud";
  if (signals.has("threat")) return "threat_impersonation";
  return confidence > 0 ? "generic_suspicious" : "none";
}

/** Fast rule-based pass: weighted signal sum clamped to [0, 1]. No I/O. */
export function scoreHeuristics(text: string): HeuristicScore {
  const lower = normalizeText(text);
  const fired = SIGNALS.filter((signal) => signal.test(lower));
  const confidence = round2(clamp01(fired.reduce((sum, signal) => sum + signal.weight, 0)));
  const signals = fired.map((signal) => signal.name);
  return { confidence, signals, category: categorize(new Set(signals), confidence) };
}

const TACTIC_NOTES: Array<[string, string]> = [
  ["urgency", "Used urgency tactics"],
  ["threat", "Employed threats"],
  ["credential", "Requested credentials"],
  ["financial", "Pushed for payment"],
  ["verification", "Verification/authentication attempt"],
  ["reward", "Prize/reward bait"],
  ["banking", "Banking/financial pretext"],
  ["link", "Shared suspicious links"]
];

export function describeTactics(assessment: ScamAssessment): string[] {
  const signals = new Set(assessment.signals);
  return TACTIC_NOTES.filter(([signal]) => signals.has(signal)).map(([, note]) => note);
}

const verdictSchema = z.object({
  is_scam: z.boolean(),
  confidence: z.coerce.number().min(0).max(1),
  category: z.string().min(1).optional(),
  categories: z.array(z.string()).optional(),
  reasoning: z.string().optional()
});

const DETECTION_PROMPT = [
  "You analyze text messages for fraud attempts.",
  "Indicators: urgency and threats, requests for OTP/PIN/CVV/passwords or account numbers,",
  "impersonation of banks, government or couriers, payment or transfer requests,",
  "suspicious links, prizes or refunds, fear tactics such as legal action or arrest.",
  "False positives are costly; only give confidence above 0.7 when clearly fraudulent.",
  "Respond with JSON only:",
  "{\"is_scam\": true|false, \"confidence\": 0.0-1.0, \"category\": \"snake_case_label\", \"reasoning\": \"short\"}"
].join("\n");

function formatTurns(history: Message[]): string {
  return history.map((m) => `${m.sender === "counterpart" ? "Sender" : "Recipient"}: ${m.text}`).join("\n");
}

export class ScamClassifier {
  private readonly historyWindow: number;

  constructor(
    private readonly llm: LlmClient | null,
    private readonly options: ClassifierOptions
  ) {
    this.historyWindow = options.historyWindow ?? 6;
  }

  async classify(message: Message, history: Message[]): Promise<Degradable<ScamAssessment>> {
    const heuristic = scoreHeuristics(message.text);
    const fallback = this.fromHeuristic(heuristic);

    if (heuristic.confidence >= this.options.threshold || heuristic.confidence <= this.options.heuristicFloor) {
      logEvent("CLASSIFIER", { stage: "heuristic", confidence: heuristic.confidence, signals: heuristic.signals });
      return primary(fallback);
    }

    if (!this.llm) {
      return this.degrade(fallback, "no LLM provider configured");
    }

    try {
      const raw = await this.llm.complete({
        system: DETECTION_PROMPT,
        user: this.buildUserPrompt(message, history),
        maxOutputTokens: 300,
        temperature: 0.3,
        timeoutMs: this.options.timeoutMs,
        json: true
      });
      const parsed = verdictSchema.safeParse(extractJson(raw));
      if (!parsed.success) {
        return this.degrade(fallback, "malformed LLM verdict");
      }
      const verdict = parsed.data;
      const confidence = round2(verdict.confidence);
      const assessment: ScamAssessment = {
        isScam: confidence >= this.options.threshold,
        confidence,
        category: verdict.category ?? verdict.categories?.[0] ?? heuristic.category,
        stage: "llm",
        signals: heuristic.signals
      };
      logEvent("CLASSIFIER", { stage: "llm", confidence, category: assessment.category, provider: this.llm.name });
      return primary(assessment);
    } catch (err) {
      return this.degrade(fallback, errorReason(err));
    }
  }

  private fromHeuristic(score: HeuristicScore): ScamAssessment {
    return {
      isScam: score.confidence >= this.options.threshold,
      confidence: score.confidence,
      category: score.category,
      stage: "heuristic",
      signals: score.signals
    };
  }

  private degrade(assessment: ScamAssessment, reason: string): Degradable<ScamAssessment> {
    safeWarn(`[CLASSIFIER] degraded to heuristic verdict (${reason}), confidence=${assessment.confidence}`);
    return degraded(assessment, reason);
  }

  private buildUserPrompt(message: Message, history: Message[]): string {
    const recent = history.slice(-this.historyWindow);
    const context = recent.length > 0 ? `CONVERSATION HISTORY:\n${formatTurns(recent)}\n\n` : "";
    return `${context}CURRENT MESSAGE TO ANALYZE:\n"${message.text}"`;
  }
}
