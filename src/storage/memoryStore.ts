/**
 * In-process PersistenceStore. Used when no database is configured and by the
 * test suite; contents are lost on restart.
 */

import {
    AnalysisEvent,
    PriceHistoryRecord,
    TokenPairRecord,
    TradeRecord,
} from '../types';
import { PersistenceStore } from './persistence';

export class MemoryStore implements PersistenceStore {
    readonly pairs = new Map<string, TokenPairRecord>();
    readonly history: PriceHistoryRecord[] = [];
    readonly events: AnalysisEvent[] = [];
    readonly trades: TradeRecord[] = [];

    async hasPair(pairAddress: string): Promise<boolean> {
        return this.pairs.has(pairAddress);
    }

    async upsertPair(record: TokenPairRecord): Promise<void> {
        if (!this.pairs.has(record.pairAddress)) {
            this.pairs.set(record.pairAddress, { ...record });
        }
    }

    async appendHistory(record: PriceHistoryRecord): Promise<void> {
        this.history.push({ ...record });
    }

    async appendEvent(event: AnalysisEvent): Promise<void> {
        this.events.push({ ...event, details: { ...event.details } });
    }

    async readRecentHistory(pairAddress: string, limit: number): Promise<PriceHistoryRecord[]> {
        if (limit <= 0) return [];
        return this.history
            .filter(record => record.pairAddress === pairAddress)
            .sort((a, b) => a.timestamp - b.timestamp)
            .slice(-limit)
            .map(record => ({ ...record }));
    }

    async readRecentPriceChanges(sinceMs: number): Promise<number[]> {
        return this.history
            .filter(record => record.timestamp >= sinceMs)
            .map(record => record.priceChange24h);
    }

    async recordTrade(trade: TradeRecord): Promise<void> {
        this.trades.push({ ...trade });
    }

    eventsFor(pairAddress: string): AnalysisEvent[] {
        return this.events.filter(event => event.pairAddress === pairAddress);
    }
}
