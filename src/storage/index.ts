import { createClient } from '@supabase/supabase-js';
import { PersistenceStore } from './persistence';
import { MemoryStore } from './memoryStore';
import { SupabaseStore } from './supabaseStore';
import logger from '../utils/logger';

export type { PersistenceStore, PairLookup } from './persistence';
export { MemoryStore } from './memoryStore';
export { SupabaseStore } from './supabaseStore';

// Validate URL format to prevent crash
const isValidUrl = (url: string) => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

/**
 * Supabase store when credentials are usable, otherwise the in-memory store.
 */
export function createPersistenceStore(supabaseUrl: string, supabaseKey: string): PersistenceStore {
    if (supabaseUrl && isValidUrl(supabaseUrl) && supabaseKey) {
        logger.info('[DB] Using Supabase persistence');
        return new SupabaseStore(createClient(supabaseUrl, supabaseKey, {
            auth: { persistSession: false, autoRefreshToken: false },
        }));
    }

    logger.warn('[DB] Missing or invalid SUPABASE_URL / SUPABASE_KEY, history is kept in memory only');
    return new MemoryStore();
}
