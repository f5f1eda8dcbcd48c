import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { env } from "./env.js";

export function createSupabaseAdmin(
  url: string | undefined = env.SUPABASE_URL,
  serviceRoleKey: string | undefined = env.SUPABASE_SERVICE_ROLE_KEY
): SupabaseClient {
  if (!url || !serviceRoleKey) {
    throw new Error("Variáveis SUPABASE_URL ou SUPABASE_SERVICE_ROLE_KEY não encontradas");
  }

  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
    },
  });
}
