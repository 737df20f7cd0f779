/**
 * Analysis Engine: Single Owner of Detection State
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Owns the ThresholdState (through the tracker), the runtime Blacklist and the
 * current FilterConfig. For every snapshot it:
 *
 *   1. reads the pair's recent history
 *   2. asks the AnomalyClassifier for a Classification
 *   3. applies blacklist additions and persists them (only when non-empty)
 *   4. applies the classification's writes in order; the first persistence
 *      failure drops the remaining writes for that pair
 *   5. enqueues events and the trade signal on the outbox; a `new` event
 *      only goes out once its token_pairs row has been written
 *
 * Thresholds are refreshed once per scan cycle, never per pair.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    Classification,
    PairSnapshot,
    PriceHistoryRecord,
    ThresholdState,
} from '../types';
import { FilterConfig, FilterConfigValues } from '../config/filterConfig';
import { ScannerSettings } from '../config/configStore';
import { SCANNER_CONFIG } from '../config/constants';
import { AnomalyClassifier } from './anomalyClassifier';
import { Blacklist } from './blacklist';
import { describeRawPair, parsePairSnapshot } from './snapshot';
import { AdaptiveThresholdTracker } from '../risk/adaptive_thresholds';
import { PersistenceStore } from '../storage/persistence';
import { SignalOutbox } from '../notifiers/outbox';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { isFiniteNumber } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Where blacklist growth is persisted (the scanner config file).
 */
export interface BlacklistSink {
    saveBlacklistedCoins(coins: readonly string[]): void;
}

export interface AnalysisEngineDependencies {
    classifier: AnomalyClassifier;
    store: PersistenceStore;
    blacklistSink: BlacklistSink;
    outbox: SignalOutbox;
    tracker: AdaptiveThresholdTracker;
    settings: ScannerSettings;
    now?: () => number;
}

export interface EngineState {
    thresholds: ThresholdState;
    filters: FilterConfigValues;
    blacklistedCoins: string[];
    blacklistedDevs: string[];
}

/** One extra record so the lookback yields a full set of returns */
const HISTORY_LOOKBACK = SCANNER_CONFIG.SHARPE_LOOKBACK_RETURNS + 1;

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class AnalysisEngine {
    private readonly classifier: AnomalyClassifier;
    private readonly store: PersistenceStore;
    private readonly blacklistSink: BlacklistSink;
    private readonly outbox: SignalOutbox;
    private readonly tracker: AdaptiveThresholdTracker;
    private readonly blacklist: Blacklist;
    private readonly now: () => number;
    private filters: FilterConfig;

    constructor(deps: AnalysisEngineDependencies) {
        this.classifier = deps.classifier;
        this.store = deps.store;
        this.blacklistSink = deps.blacklistSink;
        this.outbox = deps.outbox;
        this.tracker = deps.tracker;
        this.now = deps.now ?? Date.now;
        this.filters = deps.settings.filters;
        this.blacklist = new Blacklist(deps.settings.blacklistedCoins, deps.settings.blacklistedDevs);
    }

    /**
     * Hot reload: blacklist entries are merged in, and filters are replaced
     * when they came from the file. Defaults only ever apply at startup, so a
     * missing or unreadable file mid-run keeps the live filters.
     */
    applySettings(settings: ScannerSettings): void {
        if (settings.source === 'file') {
            this.filters = settings.filters;
        } else {
            logger.warn(`[ENGINE] Config reload fell back to defaults; keeping current filters ${JSON.stringify(this.filters.toJSON())}`);
        }
        const coins = this.blacklist.addCoins(settings.blacklistedCoins);
        const devs = this.blacklist.addDevs(settings.blacklistedDevs);
        if (coins.length > 0 || devs.length > 0) {
            logger.info(`[ENGINE] Config reload added ${coins.length} coin(s) and ${devs.length} dev wallet(s) to the blacklist`);
        }
    }

    /**
     * Recompute the ThresholdState from the last window of price changes.
     * A failed read keeps the previous state.
     */
    async refreshThresholds(): Promise<ThresholdState> {
        const since = this.now() - this.tracker.windowMs;
        try {
            const samples = (await this.store.readRecentPriceChanges(since)).filter(isFiniteNumber);
            if (this.tracker.update(samples, this.now())) {
                logger.info(`[ENGINE] Thresholds updated: volatility=${this.tracker.volatility.toFixed(2)} adjustment=${this.tracker.adjustment.toFixed(3)} (${samples.length} samples)`);
            } else {
                logger.debug(`[ENGINE] Thresholds kept: only ${samples.length} sample(s) in window`);
            }
        } catch (err: unknown) {
            logger.error(`[ENGINE] Price change read failed, keeping thresholds: ${errorMessage(err)}`);
        }
        return this.tracker.getState();
    }

    /**
     * Validate a raw market-data record and process it. Malformed records are
     * logged and skipped without touching any state.
     */
    async processRawPair(raw: unknown): Promise<Classification | null> {
        const parsed = parsePairSnapshot(raw);
        if (!parsed.ok) {
            logger.warn(`[ENGINE] Skipping malformed pair ${describeRawPair(raw)}: ${parsed.error}`);
            return null;
        }
        return this.processSnapshot(parsed.snapshot);
    }

    async processSnapshot(snapshot: PairSnapshot): Promise<Classification> {
        let history: PriceHistoryRecord[] = [];
        let historyError: string | undefined;
        try {
            history = await this.store.readRecentHistory(snapshot.pairAddress, HISTORY_LOOKBACK);
        } catch (err: unknown) {
            historyError = errorMessage(err);
            logger.error(`[ENGINE] History read failed for ${snapshot.pairAddress}: ${historyError}`);
        }

        const classification = await this.classifier.classify(
            snapshot,
            history,
            this.filters,
            this.blacklist,
            this.tracker.getState()
        );
        if (historyError && !classification.persistenceError) {
            classification.persistenceError = historyError;
        }

        this.applyBlacklistAdditions(snapshot, classification.blacklistAdditions);
        const pairRecorded = await this.applyWrites(classification);
        this.enqueueOutbound(snapshot, classification, pairRecorded);

        return classification;
    }

    getState(): EngineState {
        return {
            thresholds: this.tracker.getState(),
            filters: this.filters.toJSON(),
            blacklistedCoins: this.blacklist.coinList(),
            blacklistedDevs: this.blacklist.devList(),
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SIDE EFFECTS
    // ═══════════════════════════════════════════════════════════════════════════

    private applyBlacklistAdditions(snapshot: PairSnapshot, additions: readonly string[]): void {
        const added = this.blacklist.addCoins(additions);
        if (added.length === 0) {
            return;
        }

        logger.info(`[ENGINE] Added ${snapshot.pairAddress} (${snapshot.baseSymbol}) to BLACKLIST due to fake volume: ${added.join(', ')}`);
        try {
            this.blacklistSink.saveBlacklistedCoins(this.blacklist.coinList());
        } catch (err: unknown) {
            logger.error(`[ENGINE] Failed to persist blacklist: ${errorMessage(err)}`);
        }
    }

    /**
     * Returns whether the pair's token_pairs row was written this call.
     */
    private async applyWrites(classification: Classification): Promise<boolean> {
        const pair = classification.pairAddress;
        const { upsertPair, history, events } = classification.writes;

        if (classification.persistenceError) {
            if (upsertPair || history || events.length > 0) {
                logger.warn(`[ENGINE] Dropping writes for ${pair} this cycle after persistence error`);
            }
            return false;
        }

        let pairRecorded = false;
        const steps: Array<[string, () => Promise<void>]> = [];
        if (upsertPair) {
            steps.push(['upsertPair', async () => {
                await this.store.upsertPair(upsertPair);
                pairRecorded = true;
            }]);
        }
        if (history) steps.push(['appendHistory', () => this.store.appendHistory(history)]);
        for (const event of events) {
            steps.push([`appendEvent(${event.eventType})`, () => this.store.appendEvent(event)]);
        }

        for (const [label, step] of steps) {
            try {
                await step();
            } catch (err: unknown) {
                classification.persistenceError = errorMessage(err);
                logger.error(`[ENGINE] ${label} failed for ${pair}; dropping remaining writes: ${classification.persistenceError}`);
                return pairRecorded;
            }
        }
        return pairRecorded;
    }

    private enqueueOutbound(snapshot: PairSnapshot, classification: Classification, pairRecorded: boolean): void {
        const pair = {
            chainId: snapshot.chainId,
            baseSymbol: snapshot.baseSymbol,
            priceUsd: snapshot.priceUsd,
        };

        for (const event of classification.writes.events) {
            // Unrecorded pairs are seen as new again next poll
            if (event.eventType === 'new' && !pairRecorded) continue;
            this.outbox.enqueue({ kind: 'event', event, pair }, this.now());
        }
        if (classification.signal) {
            this.outbox.enqueue({ kind: 'trade', signal: classification.signal, pair }, this.now());
        }
    }
}
