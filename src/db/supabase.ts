import { createClient, SupabaseClient } from '@supabase/supabase-js';

// ═══════════════════════════════════════════════════════════════════════════════
// SUPABASE CLIENT — OPTIONAL PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════════
//
// Used by the critical-log transport and the ledger mirror. The engine runs
// fully in memory when the env vars are missing.

let cachedClient: SupabaseClient | null | undefined;

const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

/**
 * Resolve the shared Supabase client, or null when persistence is not configured.
 */
export function getSupabaseClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient | null {
    if (cachedClient !== undefined) {
        return cachedClient;
    }

    const supabaseUrl = env.SUPABASE_URL;
    const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_KEY;

    cachedClient = supabaseUrl && isValidUrl(supabaseUrl) && supabaseKey
        ? createClient(supabaseUrl, supabaseKey, { auth: { persistSession: false } })
        : null;

    return cachedClient;
}
