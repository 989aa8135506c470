import type { IncomingHttpHeaders } from "http";
import { maskDigitRuns } from "./mask";

export function maskApiKey(value?: string): string {
  if (!value) return "missing";
  const key = String(value);
  if (key.length <= 4) return "*".repeat(key.length);
  return "*".repeat(key.length - 4) + key.slice(-4);
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "undefined") continue;
    const lower = key.toLowerCase();
    const str = Array.isArray(value) ? value.join(",") : String(value);
    output[lower] = lower === "x-api-key" ? maskApiKey(str) : str;
  }
  return output;
}

export function safeStringify(value: unknown, maxLen: number): string {
  let text = "";
  try {
    text = typeof value === "string" ? value : JSON.stringify(value);
  } catch {
    text = String(value);
  }
  text = maskDigitRuns(text);
  if (text.length > maxLen) {
    text = `${text.slice(0, maxLen)}...(truncated)`;
  }
  return text;
}

let muted = process.env.LOG_SILENT === "true";

/** Tests flip this to keep runner output readable. */
export function setLogMuted(value: boolean): void {
  muted = value;
}

export function safeLog(message: string): void {
  if (muted) return;
  try {
    console.info(message);
  } catch {
    // swallow logging errors
  }
}

export function safeWarn(message: string): void {
  if (muted) return;
  try {
    console.warn(message);
  } catch {
    // swallow logging errors
  }
}

export function logEvent(tag: string, payload: unknown, maxLen = 2000): void {
  safeLog(`[${tag}] ${safeStringify(payload, maxLen)}`);
}
