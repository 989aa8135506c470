import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { SessionBackend } from "./types";

const TABLE = "honeypot_sessions";

const rowSchema = z.object({
  payload: z.string(),
  expires_at: z.string()
});

/**
 * Sessions as rows of `honeypot_sessions` (see sql/honeypot_sessions.sql).
 * Postgres does not expire rows, so expiry is applied on read: a stale row
 * reads as absent and is removed.
 */
export class SupabaseSessionBackend implements SessionBackend {
  readonly name = "supabase";

  constructor(
    private readonly client: SupabaseClient,
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {}

  static fromCredentials(url: string, serviceRoleKey: string, timeoutMs: number): SupabaseSessionBackend {
    const client = createClient(url, serviceRoleKey, { auth: { persistSession: false } });
    return new SupabaseSessionBackend(client, timeoutMs);
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.timeoutMs);
  }

  async get(key: string): Promise<string | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select("payload, expires_at")
      .eq("session_key", key)
      .abortSignal(this.signal())
      .maybeSingle();
    if (error) throw new Error(`supabase get failed: ${error.message}`);
    if (!data) return null;

    const row = rowSchema.safeParse(data);
    if (!row.success) return null;
    if (new Date(row.data.expires_at).getTime() <= this.now()) {
      await this.delete(key);
      return null;
    }
    return row.data.payload;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .upsert(
        {
          session_key: key,
          payload: value,
          expires_at: new Date(this.now() + ttlSeconds * 1000).toISOString()
        },
        { onConflict: "session_key" }
      )
      .abortSignal(this.signal());
    if (error) throw new Error(`supabase set failed: ${error.message}`);
  }

  async delete(key: string): Promise<void> {
    const { error } = await this.client.from(TABLE).delete().eq("session_key", key).abortSignal(this.signal());
    if (error) throw new Error(`supabase delete failed: ${error.message}`);
  }

  async ping(): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .select("session_key", { count: "exact", head: true })
      .limit(1)
      .abortSignal(this.signal());
    if (error) throw new Error(`supabase ping failed: ${error.message}`);
  }
}
