import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { Database } from "@/types";

// ============================================================
// Supabase clients
// Both are created on first use so a missing variable only
// fails the request that needs it, not the build.
// ============================================================

type ClientKind = "anon" | "service";

const KEY_VARIABLES: Record<ClientKind, string> = {
  anon: "NEXT_PUBLIC_SUPABASE_ANON_KEY",
  service: "SUPABASE_SERVICE_ROLE_KEY",
};

function readKey(kind: ClientKind): string | undefined {
  // NEXT_PUBLIC_* must be referenced literally to be inlined client-side.
  return kind === "anon"
    ? process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY
    : process.env.SUPABASE_SERVICE_ROLE_KEY;
}

const clients: Partial<Record<ClientKind, SupabaseClient<Database>>> = {};

function getClient(kind: ClientKind): SupabaseClient<Database> {
  const existing = clients[kind];
  if (existing) return existing;

  const url = process.env.NEXT_PUBLIC_SUPABASE_URL;
  const key = readKey(kind);
  if (!url || !key) {
    throw new Error(`Missing NEXT_PUBLIC_SUPABASE_URL or ${KEY_VARIABLES[kind]}`);
  }
  const client = createClient<Database>(url, key, {
    auth: { persistSession: kind === "anon" },
  });
  clients[kind] = client;
  return client;
}

function lazyClient(kind: ClientKind): SupabaseClient<Database> {
  return new Proxy({} as SupabaseClient<Database>, {
    get(_target, prop) {
      return (getClient(kind) as unknown as Record<string | symbol, unknown>)[prop];
    },
  });
}

/** Anon client for client components. */
export const supabase = lazyClient("anon");

/** Service-role client. Only import this in API routes and server components. */
export const supabaseServer = lazyClient("service");
