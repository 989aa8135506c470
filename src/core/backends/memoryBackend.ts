import type { SessionBackend } from "./types";

type Entry = {
  value: string;
  expiresAt: number;
};

/** Process-local fallback. Contents die with the process. */
export class MemorySessionBackend implements SessionBackend {
  readonly name = "memory";
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    this.sweep(now);
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ping(): Promise<void> {
    return;
  }

  size(): number {
    return this.entries.size;
  }

  // Abandoned sessions are never read again, so writes clear them out.
  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
