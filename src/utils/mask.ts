/** Masks every run of three or more digits down to its last two; used on whole log lines. */
export function maskDigitRuns(input: string): string {
  return input.replace(/\d{3,}/g, (run) => "*".repeat(run.length - 2) + run.slice(-2));
}

/** Masks all digits in a value but the last `visible`, keeping separators in place. */
export function maskDigits(value: string, visible: number = 4): string {
  const digits = value.replace(/\D/g, "");
  if (digits.length <= visible) return value;
  const masked = "*".repeat(digits.length - visible) + digits.slice(-visible);
  let cursor = 0;
  return value.replace(/\d/g, () => masked[cursor++] ?? "*");
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
