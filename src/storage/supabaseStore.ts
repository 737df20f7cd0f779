/**
 * Supabase-backed PersistenceStore.
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * Row shapes match sql/schema.sql. Timestamps are written as ISO strings
 * (timestamptz) except token_pairs.created_at, which keeps the pair's
 * creation time in epoch seconds.
 *
 * PostgREST caps every response at its "max rows" setting (1000 by default)
 * without reporting the cut, so window reads page with range() until a short
 * page comes back.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
    AnalysisEvent,
    PriceHistoryRecord,
    TokenPairRecord,
    TradeRecord,
} from '../types';
import { PersistenceStore } from './persistence';
import { PersistenceError } from '../utils/errors';
import logger from '../utils/logger';

const HistoryRowSchema = z.object({
    pair_address: z.string(),
    price_usd: z.coerce.number(),
    volume_24h: z.coerce.number(),
    liquidity_usd: z.coerce.number(),
    price_change_24h: z.coerce.number(),
    timestamp: z.string(),
});

const PriceChangeRowSchema = z.object({
    price_change_24h: z.coerce.number(),
});

interface QueryError {
    message: string;
    code?: string;
}

/** Must not exceed the project's PostgREST max rows */
export const DEFAULT_PAGE_SIZE = 1000;

export interface SupabaseStoreOptions {
    pageSize?: number;
}

function fail(operation: string, error: QueryError): never {
    throw new PersistenceError(operation, error.code ? `${error.message} (${error.code})` : error.message);
}

function toIso(epochMs: number): string {
    return new Date(epochMs).toISOString();
}

export class SupabaseStore implements PersistenceStore {
    private readonly client: SupabaseClient;
    private readonly pageSize: number;

    constructor(client: SupabaseClient, options: SupabaseStoreOptions = {}) {
        this.client = client;
        this.pageSize = Math.max(1, Math.floor(options.pageSize ?? DEFAULT_PAGE_SIZE));
    }

    async hasPair(pairAddress: string): Promise<boolean> {
        const { data, error } = await this.client
            .from('token_pairs')
            .select('pair_address')
            .eq('pair_address', pairAddress)
            .maybeSingle();

        if (error) fail('hasPair', error);
        return data !== null;
    }

    async upsertPair(record: TokenPairRecord): Promise<void> {
        const { error } = await this.client
            .from('token_pairs')
            .upsert({
                pair_address: record.pairAddress,
                chain_id: record.chainId,
                base_token: record.baseSymbol,
                quote_token: record.quoteSymbol,
                created_at: record.createdAt,
                first_seen: toIso(record.firstSeen),
                dev_wallet: record.devWallet,
            }, { onConflict: 'pair_address', ignoreDuplicates: true });

        if (error) fail('upsertPair', error);
        logger.debug(`[DB] token_pairs upsert ${record.pairAddress.slice(0, 10)}...`);
    }

    async appendHistory(record: PriceHistoryRecord): Promise<void> {
        const { error } = await this.client
            .from('price_history')
            .insert({
                pair_address: record.pairAddress,
                price_usd: record.priceUsd,
                volume_24h: record.volume24h,
                liquidity_usd: record.liquidityUsd,
                price_change_24h: record.priceChange24h,
                timestamp: toIso(record.timestamp),
            });

        if (error) fail('appendHistory', error);
    }

    async appendEvent(event: AnalysisEvent): Promise<void> {
        const { error } = await this.client
            .from('analysis')
            .insert({
                pair_address: event.pairAddress,
                event_type: event.eventType,
                detected_at: toIso(event.detectedAt),
                details: event.details,
            });

        if (error) fail('appendEvent', error);
    }

    async readRecentHistory(pairAddress: string, limit: number): Promise<PriceHistoryRecord[]> {
        if (limit <= 0) return [];

        const { data, error } = await this.client
            .from('price_history')
            .select('pair_address, price_usd, volume_24h, liquidity_usd, price_change_24h, timestamp')
            .eq('pair_address', pairAddress)
            .order('timestamp', { ascending: false })
            .limit(limit);

        if (error) fail('readRecentHistory', error);

        const rows = HistoryRowSchema.array().safeParse(data ?? []);
        if (!rows.success) {
            throw new PersistenceError('readRecentHistory', rows.error.message);
        }

        return rows.data
            .map(row => ({
                pairAddress: row.pair_address,
                priceUsd: row.price_usd,
                volume24h: row.volume_24h,
                liquidityUsd: row.liquidity_usd,
                priceChange24h: row.price_change_24h,
                timestamp: Date.parse(row.timestamp),
            }))
            .reverse();
    }

    async readRecentPriceChanges(sinceMs: number): Promise<number[]> {
        const since = toIso(sinceMs);
        const changes: number[] = [];

        for (let from = 0; ; from += this.pageSize) {
            const { data, error } = await this.client
                .from('price_history')
                .select('price_change_24h')
                .gte('timestamp', since)
                .order('id', { ascending: true })
                .range(from, from + this.pageSize - 1);

            if (error) fail('readRecentPriceChanges', error);

            const rows = PriceChangeRowSchema.array().safeParse(data ?? []);
            if (!rows.success) {
                throw new PersistenceError('readRecentPriceChanges', rows.error.message);
            }
            for (const row of rows.data) {
                changes.push(row.price_change_24h);
            }
            if (rows.data.length < this.pageSize) break;
        }

        logger.debug(`[DB] price_history window read: ${changes.length} row(s) since ${since}`);
        return changes;
    }

    async recordTrade(trade: TradeRecord): Promise<void> {
        const { error } = await this.client
            .from('trades')
            .insert({
                pair_address: trade.pairAddress,
                action: trade.action,
                amount: trade.amount,
                price: trade.price,
                fee: trade.fee,
                timestamp: toIso(trade.timestamp),
            });

        if (error) fail('recordTrade', error);
    }
}
