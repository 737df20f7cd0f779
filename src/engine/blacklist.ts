/**
 * Disqualified coins (token symbols and pair addresses) and developer wallets.
 *
 * Entries are only ever added. The classifier reads it through
 * `ReadonlyBlacklist`; the AnalysisEngine is the single writer.
 */

import { PairSnapshot } from '../types';

export interface ReadonlyBlacklist {
    hasCoin(entry: string): boolean;
    hasDev(wallet: string): boolean;
    /** Which field of the snapshot matched, or null */
    match(snapshot: PairSnapshot): BlacklistMatch | null;
}

export interface BlacklistMatch {
    field: 'baseSymbol' | 'quoteSymbol' | 'pairAddress' | 'creatorWallet';
    value: string;
}

export class Blacklist implements ReadonlyBlacklist {
    private readonly coins: Set<string>;
    private readonly devs: Set<string>;

    constructor(coins: Iterable<string> = [], devs: Iterable<string> = []) {
        this.coins = new Set(coins);
        this.devs = new Set(devs);
    }

    hasCoin(entry: string): boolean {
        return this.coins.has(entry);
    }

    hasDev(wallet: string): boolean {
        return this.devs.has(wallet);
    }

    match(snapshot: PairSnapshot): BlacklistMatch | null {
        if (this.coins.has(snapshot.baseSymbol)) return { field: 'baseSymbol', value: snapshot.baseSymbol };
        if (this.coins.has(snapshot.quoteSymbol)) return { field: 'quoteSymbol', value: snapshot.quoteSymbol };
        if (this.coins.has(snapshot.pairAddress)) return { field: 'pairAddress', value: snapshot.pairAddress };
        if (this.devs.has(snapshot.creatorWallet)) return { field: 'creatorWallet', value: snapshot.creatorWallet };
        return null;
    }

    /**
     * @returns the entries that were not present before
     */
    addCoins(entries: Iterable<string>): string[] {
        const added: string[] = [];
        for (const entry of entries) {
            if (!this.coins.has(entry)) {
                this.coins.add(entry);
                added.push(entry);
            }
        }
        return added;
    }

    addDevs(wallets: Iterable<string>): string[] {
        const added: string[] = [];
        for (const wallet of wallets) {
            if (!this.devs.has(wallet)) {
                this.devs.add(wallet);
                added.push(wallet);
            }
        }
        return added;
    }

    coinList(): string[] {
        return Array.from(this.coins);
    }

    devList(): string[] {
        return Array.from(this.devs);
    }

    get size(): number {
        return this.coins.size + this.devs.size;
    }
}
