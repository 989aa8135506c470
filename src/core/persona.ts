import { logEvent, safeWarn } from "../utils/logging";
import {
  degraded,
  errorReason,
  primary,
  type ConversationMetadata,
  type Degradable,
  type FindingKind,
  type IntelligenceFinding,
  type Message
} from "../utils/types";
import type { LlmClient } from "./providers";
import { normalizeReplyStyle } from "./style";

export type Persona = {
  personaId: string;
  languageStyle: "english" | "hinglish_light";
  techLevel: "low" | "medium";
  context: "office" | "traffic" | "metro" | "home";
  tone: "polite" | "panicky";
  signatureWords: string[];
};

const languageStyles: Persona["languageStyle"][] = ["english", "hinglish_light"];
const techLevels: Persona["techLevel"][] = ["low", "medium"];
const contexts: Persona["context"][] = ["office", "traffic", "metro", "home"];
const tones: Persona["tone"][] = ["polite", "panicky"];

const signatureByTone: Record<Persona["tone"], string[][]> = {
  polite: [["sir"], ["ji"], ["please"], ["sir", "please"]],
  panicky: [["pls"], ["please"], ["sir"], ["pls", "please"]]
};

export function seedHash(seed: string): number {
  let hash = 0;
  for (let i = 0; i < seed.length; i += 1) {
    hash = (hash * 31 + seed.charCodeAt(i)) % 100000;
  }
  return hash;
}

function pick<T>(pool: readonly T[], seed: string): T {
  return pool[seedHash(seed) % pool.length];
}

/** Same session id, same persona: traits never drift between turns. */
export function personaFor(sessionId: string, metadata: ConversationMetadata = {}): Persona {
  const tone = pick(tones, `${sessionId}:tone`);
  const indian = (metadata.locale || "").toUpperCase() === "IN";
  return {
    personaId: seedHash(sessionId).toString(36),
    languageStyle: indian ? pick(languageStyles, `${sessionId}:lang`) : "english",
    techLevel: pick(techLevels, `${sessionId}:tech`),
    context: pick(contexts, `${sessionId}:ctx`),
    tone,
    signatureWords: pick(signatureByTone[tone], `${sessionId}:sig`)
  };
}

type ProbeTarget = {
  key: string;
  goal: string;
  fallbacks: string[];
};

const PROBE_LADDER: Array<ProbeTarget & { kind: FindingKind }> = [
  {
    kind: "phone_number",
    key: "ask_callback_number",
    goal: "Get a phone number you can call them back on.",
    fallbacks: [
      "I'm getting worried. Which number can I call you on?",
      "Call is easier for me than typing. What's your number?"
    ]
  },
  {
    kind: "upi_handle",
    key: "ask_upi_handle",
    goal: "Get the UPI ID or payment handle they want money sent to.",
    fallbacks: [
      "Ok if I have to pay, which UPI ID should I use?",
      "My app is asking where to send. What UPI ID is it?"
    ]
  },
  {
    kind: "url",
    key: "ask_link",
    goal: "Get the exact website link they want you to open.",
    fallbacks: [
      "Where do I do this, is there some website?",
      "I can't find it in my app. Which site should I open?"
    ]
  },
  {
    kind: "bank_account",
    key: "ask_account_for_transfer",
    goal: "Get the bank account number they want a transfer to go to.",
    fallbacks: [
      "UPI is not working for me. Can I do bank transfer instead, to which account?",
      "My son says do NEFT. Which account should it go to?"
    ]
  },
  {
    kind: "email",
    key: "ask_email",
    goal: "Get an email address to send documents to.",
    fallbacks: ["Can I send the documents by mail? What's the email?"]
  }
];

const ALTERNATE_HANDLE: ProbeTarget = {
  key: "ask_alternate_handle",
  goal: "Get a second, alternate payment handle because the first one is failing.",
  fallbacks: [
    "It says payment failed on that one. Do you have another UPI ID?",
    "Transfer is not going through. Any other number or ID I can send to?"
  ]
};

export const STALL_REPLIES = [
  "Sorry, can you repeat that?",
  "Sorry I didn't get that. What should I do?",
  "Wait, I'm confused. Can you explain again?"
];

const NEUTRAL_REPLIES = [
  "Sorry, who is this?",
  "Hi, I think you have the wrong number?",
  "Ok. What is this about?"
];

/**
 * Picks the next finding kind to go after. Missing kinds come first, rotated
 * by how many replies we have already sent so the same question is not asked
 * twice in a row.
 */
export function chooseProbe(intelligence: IntelligenceFinding[], agentTurns: number): ProbeTarget {
  const have = new Set(intelligence.map((finding) => finding.kind));
  const missing = PROBE_LADDER.filter((probe) => !have.has(probe.kind));
  if (missing.length === 0) return ALTERNATE_HANDLE;
  return missing[agentTurns % missing.length];
}

export function neutralReply(seed: string): string {
  return pick(NEUTRAL_REPLIES, seed);
}

export type PersonaInput = {
  sessionId: string;
  history: Message[];
  metadata: ConversationMetadata;
  intelligence: IntelligenceFinding[];
};

export type PersonaOptions = {
  timeoutMs: number;
};

const SYSTEM_PROMPT = [
  "You are roleplaying as an ordinary person who just received messages on their phone.",
  "You are a real person: a bit confused and worried, slightly gullible, but you ask questions.",
  "Never say or hint that you are an AI, an assistant, or that you suspect anything.",
  "Keep every reply to one or two short sentences, like a real SMS. One question at most.",
  "Casual language, no formal phrases, no lists, no paragraphs.",
  "Never share a real OTP, PIN, password, card or account number; stall or make an excuse instead.",
  "Do not repeat a question you already asked in the transcript.",
  "Output ONLY the reply text. No quotes, no JSON, no explanations."
].join("\n");

function maxLengthFor(metadata: ConversationMetadata): number {
  return (metadata.channel || "").toLowerCase() === "email" ? 300 : 160;
}

function describeGathered(intelligence: IntelligenceFinding[]): string {
  const kinds = Array.from(new Set(intelligence.filter((f) => f.kind !== "keyword").map((f) => f.kind)));
  return kinds.length > 0 ? kinds.join(", ") : "nothing yet";
}

function formatTranscript(history: Message[]): string {
  if (history.length === 0) return "(no messages yet)";
  return history.map((m) => `${m.sender === "counterpart" ? "Them" : "You"}: ${m.text}`).join("\n");
}

export class PersonaAgent {
  constructor(
    private readonly llm: LlmClient | null,
    private readonly options: PersonaOptions
  ) {}

  async generateReply(input: PersonaInput): Promise<Degradable<string>> {
    const persona = personaFor(input.sessionId, input.metadata);
    const lastReplies = input.history.filter((m) => m.sender === "agent").map((m) => m.text);
    const probe = chooseProbe(input.intelligence, lastReplies.length);
    const style = { lastReplies, maxLength: maxLengthFor(input.metadata) };

    if (!this.llm) {
      return this.fallback(input.sessionId, probe, lastReplies, "no LLM provider configured");
    }

    try {
      const draft = await this.llm.complete({
        system: SYSTEM_PROMPT,
        user: this.buildUserPrompt(input, persona, probe),
        maxOutputTokens: 120,
        temperature: 0.7,
        timeoutMs: this.options.timeoutMs
      });
      const styled = normalizeReplyStyle(draft, style);
      if (!styled.ok) {
        return this.fallback(input.sessionId, probe, lastReplies, `reply rejected: ${styled.reason}`);
      }
      logEvent("PERSONA", { sessionId: input.sessionId, probe: probe.key, provider: this.llm.name });
      return primary(styled.text);
    } catch (err) {
      return this.fallback(input.sessionId, probe, lastReplies, errorReason(err));
    }
  }

  private fallback(sessionId: string, probe: ProbeTarget, lastReplies: string[], reason: string): Degradable<string> {
    safeWarn(`[PERSONA] ${sessionId} using fallback reply (${reason})`);
    const recent = new Set(lastReplies.slice(-3));
    const pool = [...probe.fallbacks, ...STALL_REPLIES].filter((reply) => !recent.has(reply));
    const reply = pool.length > 0 ? pick(pool, `${sessionId}:${lastReplies.length}`) : STALL_REPLIES[0];
    return degraded(reply, reason);
  }

  private buildUserPrompt(input: PersonaInput, persona: Persona, probe: ProbeTarget): string {
    const { channel, language, locale } = input.metadata;
    return [
      `persona: tone=${persona.tone}, context=${persona.context}, languageStyle=${persona.languageStyle}, techLevel=${persona.techLevel}, signatureWords=${persona.signatureWords.join(",")}`,
      `channel: ${channel || "SMS"}`,
      `language: ${language || "English"}${locale ? ` (${locale})` : ""}`,
      `alreadyGathered: ${describeGathered(input.intelligence)}`,
      `goalForThisReply: ${probe.goal} Ask for it innocently, as a confused person trying to comply.`,
      "transcript:",
      formatTranscript(input.history)
    ].join("\n");
  }
}
