export type StyleContext = {
  lastReplies: string[];
  maxLength: number;
};

export type StyleResult = { ok: true; text: string } | { ok: false; reason: string };

// Anything that would tell the other side the conversation is being watched.
const REVEALING = /\b(scam|scams|scammer|fraud|fraudster|honeypot|honey pot|ai|bot|chatbot|language model|as an assistant)\b/i;

const FORMAL_WORDS = [
  /\bkindly\b/gi,
  /\bverifiable\b/gi,
  /\binvestigation\b/gi,
  /\blegitimate channels?\b/gi,
  /\bfurnish\b/gi
];

const ROLE_PREFIX = /^(you|me|user|recipient|reply)\s*:\s*/i;

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function stripFormalWords(text: string): string {
  let out = text;
  for (const re of FORMAL_WORDS) out = out.replace(re, "");
  return out;
}

function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").replace(/\s+([?.!,])/g, "$1").trim();
}

function ensureSingleQuestion(text: string): string {
  const idx = text.indexOf("?");
  if (idx === -1) return text;
  return text.slice(0, idx + 1);
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const head = text.slice(0, maxLength);
  const boundary = Math.max(head.lastIndexOf(". "), head.lastIndexOf("! "));
  if (boundary > maxLength / 2) return head.slice(0, boundary + 1);
  return `${head.slice(0, maxLength - 3).trim()}...`;
}

function asksForSensitive(lower: string): boolean {
  return /(send|share|give|tell|type|enter)\s+(me\s+)?(your\s+)?(otp|pin|cvv|password)/.test(lower);
}

function repeatsRecent(text: string, lastReplies: string[]): boolean {
  const norm = normalize(text);
  return lastReplies.slice(-3).some((prev) => normalize(prev) === norm);
}

export function validateReply(text: string, ctx: StyleContext): StyleResult {
  if (!text) return { ok: false, reason: "empty" };
  if (text.length > ctx.maxLength) return { ok: false, reason: "too_long" };
  if (/\d{4,}/.test(text)) return { ok: false, reason: "digits" };
  if (REVEALING.test(text)) return { ok: false, reason: "revealing" };
  if (asksForSensitive(text.toLowerCase())) return { ok: false, reason: "sensitive" };
  if (repeatsRecent(text, ctx.lastReplies)) return { ok: false, reason: "repeat" };
  return { ok: true, text };
}

/**
 * Shapes a model draft into one short chat line and checks it against the
 * persona rules. A rejected draft is reported with the rule it broke.
 */
export function normalizeReplyStyle(reply: string, ctx: StyleContext): StyleResult {
  let text = String(reply || "").trim();
  text = text.replace(/^["'“”]+|["'“”]+$/g, "");
  text = text.replace(/\r?\n+/g, " ");
  text = text.replace(ROLE_PREFIX, "");
  text = stripFormalWords(text);
  text = normalizeSpacing(text);
  text = ensureSingleQuestion(text);
  text = truncate(text, ctx.maxLength);
  return validateReply(text, ctx);
}
