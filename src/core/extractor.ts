import type { FindingKind, IntelligenceFinding } from "../utils/types";

// Terms that mark a message as scam-flavoured when they appear as whole words.
const SCAM_KEYWORDS = [
  "urgent",
  "immediately",
  "verify",
  "otp",
  "blocked",
  "suspended",
  "frozen",
  "refund",
  "kyc",
  "expire",
  "penalty",
  "legal action",
  "arrest",
  "police",
  "lottery",
  "prize",
  "reward",
  "cashback",
  "password",
  "pin",
  "cvv",
  "click here",
  "account",
  "bank",
  "upi",
  "transfer",
  "payment",
  "link"
] as const;

type ExtractionRule = {
  kind: FindingKind;
  patterns: RegExp[];
  normalize: (raw: string) => string | null;
};

// Masked spans must never read as digits, letters or whitespace.
const CONSUMED = "\u0000";
const CONTEXT_RADIUS = 20;

function digitsOnly(raw: string): string {
  return raw.replace(/\D/g, "");
}

function normalizeUrl(raw: string): string | null {
  const trimmed = raw.replace(/[.,;:!?)\]}'"]+$/g, "");
  // A scheme or "www." must be followed by a host.
  if (!/^(?:https?:\/\/|www\.)[\w-]/i.test(trimmed)) return null;
  return trimmed;
}

function normalizeInternationalPhone(raw: string): string | null {
  const digits = digitsOnly(raw);
  if (digits.length < 8 || digits.length > 17) return null;
  return `+${digits}`;
}

function normalizeDomesticPhone(raw: string): string | null {
  const digits = digitsOnly(raw);
  // Mobile numbers carry an optional trunk zero in front of the ten digits.
  if (digits.length === 11 && digits.startsWith("0") && /^[6-9]/.test(digits.slice(1))) {
    return digits.slice(1);
  }
  return digits.length >= 10 ? digits : null;
}

function normalizeBankAccount(raw: string): string | null {
  const digits = digitsOnly(raw);
  return digits.length >= 10 && digits.length <= 18 ? digits : null;
}

// Applied top to bottom; a later rule never sees text an earlier rule consumed.
const RULES: ExtractionRule[] = [
  {
    kind: "url",
    patterns: [/\bhttps?:\/\/[^\s<>"'`]+/gi, /\bwww\.[^\s<>"'`]+/gi],
    normalize: normalizeUrl
  },
  {
    kind: "email",
    patterns: [/(?<![a-z0-9._%+-])[a-z0-9._%+-]+@[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}\b/gi],
    normalize: (raw) => raw.toLowerCase()
  },
  {
    kind: "upi_handle",
    patterns: [/(?<![\w.-])[a-z0-9._]{2,}@[a-z0-9]{2,}(?![\w@]|\.\w)/gi],
    normalize: (raw) => raw.toLowerCase()
  },
  {
    kind: "phone_number",
    patterns: [/\+\d{1,3}[\s.-]?(?:\d{5}[\s-]\d{5}|\d{3}[\s-]\d{3}[\s-]\d{4}|\d{7,14})(?!\d)/g],
    normalize: normalizeInternationalPhone
  },
  {
    kind: "phone_number",
    patterns: [/(?<![\d+])0?[6-9]\d{4}[\s-]?\d{5}(?!\d)/g, /(?<![\d+])0\d{2,4}[\s-]\d{6,8}(?!\d)/g],
    normalize: normalizeDomesticPhone
  },
  {
    kind: "bank_account",
    patterns: [/(?<!\d)(?:\d{4}[ -]){2,4}\d{2,6}(?!\d)/g, /(?<!\d)\d{10,18}(?!\d)/g],
    normalize: normalizeBankAccount
  }
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const KEYWORD_PATTERNS: Array<{ term: string; pattern: RegExp }> = SCAM_KEYWORDS.map((term) => ({
  term,
  pattern: new RegExp(`\\b${term.split(" ").map(escapeRegex).join("\\s+")}\\b`, "i")
}));

function snippet(text: string, start: number, end: number): string {
  const from = Math.max(0, start - CONTEXT_RADIUS);
  const to = Math.min(text.length, end + CONTEXT_RADIUS);
  return text.slice(from, to).replace(/\s+/g, " ").trim();
}

function consume(masked: string, start: number, end: number): string {
  return masked.slice(0, start) + CONSUMED.repeat(end - start) + masked.slice(end);
}

function findingKey(finding: Pick<IntelligenceFinding, "kind" | "value">): string {
  return `${finding.kind}:${finding.value}`;
}

/** Order-preserving set union keyed by `(kind, value)`. */
export function mergeFindings(
  existing: IntelligenceFinding[],
  incoming: IntelligenceFinding[]
): IntelligenceFinding[] {
  const seen = new Set(existing.map(findingKey));
  const merged = [...existing];
  for (const finding of incoming) {
    const key = findingKey(finding);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(finding);
  }
  return merged;
}

/**
 * Parses free text into typed findings. Pure; any string (including an empty
 * or garbled one) yields a possibly empty list without duplicates.
 */
export function extractIntelligence(text: string): IntelligenceFinding[] {
  if (typeof text !== "string" || text.length === 0) return [];

  let masked = text;
  const found: IntelligenceFinding[] = [];

  for (const rule of RULES) {
    for (const pattern of rule.patterns) {
      const accepted: Array<{ start: number; end: number }> = [];
      for (const match of masked.matchAll(pattern)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        const value = rule.normalize(match[0]);
        if (!value) continue;
        accepted.push({ start, end });
        found.push({ kind: rule.kind, value, context: snippet(text, start, end) });
      }
      for (const span of accepted) {
        masked = consume(masked, span.start, span.end);
      }
    }
  }

  for (const { term, pattern } of KEYWORD_PATTERNS) {
    const match = pattern.exec(masked);
    if (!match) continue;
    const start = match.index;
    found.push({ kind: "keyword", value: term, context: snippet(text, start, start + match[0].length) });
  }

  return mergeFindings([], found);
}

/** Findings that identify the counterpart; keywords are excluded. */
export function countActionable(findings: IntelligenceFinding[]): number {
  return findings.filter((finding) => finding.kind !== "keyword").length;
}

export function valuesOf(findings: IntelligenceFinding[], kind: FindingKind): string[] {
  return findings.filter((finding) => finding.kind === kind).map((finding) => finding.value);
}

const SUMMARY_LABELS: Array<[FindingKind, string]> = [
  ["bank_account", "bank account(s)"],
  ["upi_handle", "UPI ID(s)"],
  ["phone_number", "phone number(s)"],
  ["url", "suspicious link(s)"],
  ["email", "email(s)"]
];

export function summarizeFindings(findings: IntelligenceFinding[]): string {
  const items = SUMMARY_LABELS.map(([kind, label]) => {
    const count = valuesOf(findings, kind).length;
    return count > 0 ? `${count} ${label}` : "";
  }).filter(Boolean);
  if (items.length === 0) return "No intelligence extracted yet";
  return `Extracted: ${items.join(", ")}`;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}
