/**
 * Persistence boundary used by the engine and the dispatcher.
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * TABLES (see sql/schema.sql):
 * - token_pairs    pair_address unique, insert is ignore-on-conflict
 * - price_history  append-only, one row per admitted snapshot
 * - analysis       new / rug / pump events with a JSON detail payload
 * - trades         delivered trade commands
 * 
 * Implementations throw PersistenceError on failure; callers decide whether
 * to drop the remaining writes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    AnalysisEvent,
    PriceHistoryRecord,
    TokenPairRecord,
    TradeRecord,
} from '../types';

/**
 * Read-only view the classifier uses for new-pair detection.
 */
export interface PairLookup {
    hasPair(pairAddress: string): Promise<boolean>;
}

export interface PersistenceStore extends PairLookup {
    /** No-op when the pair address already exists */
    upsertPair(record: TokenPairRecord): Promise<void>;
    appendHistory(record: PriceHistoryRecord): Promise<void>;
    appendEvent(event: AnalysisEvent): Promise<void>;
    /** Most recent `limit` records of a pair, oldest first */
    readRecentHistory(pairAddress: string, limit: number): Promise<PriceHistoryRecord[]>;
    /** price_change_24h of every history row at or after `sinceMs`, across pairs */
    readRecentPriceChanges(sinceMs: number): Promise<number[]>;
    recordTrade(trade: TradeRecord): Promise<void>;
}
