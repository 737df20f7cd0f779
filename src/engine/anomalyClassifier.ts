/**
 * Anomaly Classifier: Per-Snapshot Decision Core
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PIPELINE (first gate that decides wins):
 *   1. Reputation gate     rating must be "good"            → skipped: unrated
 *   2. Fake-volume gate    oracle says volume is fake       → skipped: fake-volume
 *   3. Blacklist gate      symbol / pair / creator listed   → skipped: blacklisted
 *   4. New-pair detection  unseen pair younger than 24h     → `new` event
 *   5. Admission filter    FilterConfig.passes()            → filtered
 *   6. History append
 *   7. Detection           rug → pump → dip → normal
 *
 * FAILURE POLICY:
 *   reputation oracle errors are fail-closed (pair skipped)
 *   fake-volume oracle errors are fail-open (pair continues)
 *
 * The classifier never writes. It returns the writes, the signal and the
 * blacklist additions; the AnalysisEngine applies them.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    AnalysisEvent,
    Classification,
    ClassificationOutcome,
    PairSnapshot,
    PairWrites,
    PriceHistoryRecord,
    SkipReason,
    ThresholdState,
    TradeSignal,
} from '../types';
import { FilterConfig } from '../config/filterConfig';
import { SCANNER_CONFIG } from '../config/constants';
import { ReadonlyBlacklist } from './blacklist';
import { FakeVolumeOracle, ReputationOracle } from './oracles';
import { PairLookup } from '../storage/persistence';
import { RiskSizer } from '../risk/riskSizer';
import { historySharpeRatio, SharpeConfig, DEFAULT_SHARPE_CONFIG } from '../risk/sharpe';
import {
    AdaptiveThresholdConfig,
    DEFAULT_CONFIG as DEFAULT_THRESHOLD_CONFIG,
    effectiveThresholds,
} from '../risk/adaptive_thresholds';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface DetectionRules {
    rugMaxLiquidityUsd: number;
    pumpMinVolumeUsd: number;
    dipThreshold: number;
    dipSellAmount: number;
    newPairHours: number;
}

export const DEFAULT_DETECTION_RULES: DetectionRules = {
    rugMaxLiquidityUsd: SCANNER_CONFIG.RUG_MAX_LIQUIDITY_USD,
    pumpMinVolumeUsd: SCANNER_CONFIG.PUMP_MIN_VOLUME_USD,
    dipThreshold: SCANNER_CONFIG.DIP_THRESHOLD,
    dipSellAmount: SCANNER_CONFIG.DIP_SELL_AMOUNT,
    newPairHours: SCANNER_CONFIG.NEW_PAIR_HOURS,
};

export interface ClassifierDependencies {
    reputation: ReputationOracle;
    fakeVolume: FakeVolumeOracle;
    pairs: PairLookup;
    sizer: RiskSizer;
    rules?: Partial<DetectionRules>;
    thresholdConfig?: AdaptiveThresholdConfig;
    sharpeConfig?: SharpeConfig;
    now?: () => number;
}

const HOUR_MS = 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFIER
// ═══════════════════════════════════════════════════════════════════════════════

export class AnomalyClassifier {
    private readonly reputation: ReputationOracle;
    private readonly fakeVolume: FakeVolumeOracle;
    private readonly pairs: PairLookup;
    private readonly sizer: RiskSizer;
    private readonly rules: DetectionRules;
    private readonly thresholdConfig: AdaptiveThresholdConfig;
    private readonly sharpeConfig: SharpeConfig;
    private readonly now: () => number;

    constructor(deps: ClassifierDependencies) {
        this.reputation = deps.reputation;
        this.fakeVolume = deps.fakeVolume;
        this.pairs = deps.pairs;
        this.sizer = deps.sizer;
        this.rules = { ...DEFAULT_DETECTION_RULES, ...(deps.rules ?? {}) };
        this.thresholdConfig = deps.thresholdConfig ?? DEFAULT_THRESHOLD_CONFIG;
        this.sharpeConfig = deps.sharpeConfig ?? DEFAULT_SHARPE_CONFIG;
        this.now = deps.now ?? Date.now;
    }

    async classify(
        snapshot: PairSnapshot,
        history: readonly PriceHistoryRecord[],
        config: FilterConfig,
        blacklist: ReadonlyBlacklist,
        thresholdState: ThresholdState
    ): Promise<Classification> {
        const pair = snapshot.pairAddress;
        const result = this.emptyResult(snapshot, history, thresholdState);

        // ───────────────────────────────────────────────────────────────────────
        // 1. Reputation gate (fail-closed)
        // ───────────────────────────────────────────────────────────────────────
        if (!(await this.isRatedGood(pair))) {
            logger.info(`[CLASSIFIER] Pair ${pair} not rated 'good'. Skipping.`);
            return this.skip(result, 'unrated');
        }

        // ───────────────────────────────────────────────────────────────────────
        // 2. Fake-volume gate (fail-open)
        // ───────────────────────────────────────────────────────────────────────
        if (await this.hasFakeVolume(snapshot)) {
            result.blacklistAdditions = [pair, snapshot.baseSymbol]
                .filter((entry, index, all) => all.indexOf(entry) === index)
                .filter(entry => !blacklist.hasCoin(entry));
            return this.skip(result, 'fake-volume');
        }

        // ───────────────────────────────────────────────────────────────────────
        // 3. Blacklist gate
        // ───────────────────────────────────────────────────────────────────────
        const listed = blacklist.match(snapshot);
        if (listed) {
            logger.info(`[CLASSIFIER] Pair ${pair} blacklisted (${listed.field}: ${listed.value})`);
            return this.skip(result, 'blacklisted');
        }

        const now = this.now();

        // ───────────────────────────────────────────────────────────────────────
        // 4. New-pair detection
        // ───────────────────────────────────────────────────────────────────────
        let seen: boolean;
        try {
            seen = await this.pairs.hasPair(pair);
        } catch (err: unknown) {
            result.persistenceError = errorMessage(err);
            logger.error(`[CLASSIFIER] Pair lookup failed for ${pair}: ${result.persistenceError}`);
            seen = true;
        }

        if (!seen) {
            result.isNewPair = true;
            result.writes.upsertPair = {
                pairAddress: pair,
                chainId: snapshot.chainId,
                baseSymbol: snapshot.baseSymbol,
                quoteSymbol: snapshot.quoteSymbol,
                createdAt: Math.floor(snapshot.createdAtMs / 1000),
                firstSeen: now,
                devWallet: snapshot.creatorWallet,
            };

            const ageHours = (now - snapshot.createdAtMs) / HOUR_MS;
            if (ageHours < this.rules.newPairHours) {
                result.writes.events.push(this.event(pair, 'new', now, {
                    age_hours: Number(ageHours.toFixed(2)),
                    max_age_hours: this.rules.newPairHours,
                    chain_id: snapshot.chainId,
                }));
                logger.info(`[CLASSIFIER] New pair detected: ${pair} (${snapshot.baseSymbol}/${snapshot.quoteSymbol}, ${ageHours.toFixed(1)}h old)`);
            }
        }

        // ───────────────────────────────────────────────────────────────────────
        // 5. Admission filter
        // ───────────────────────────────────────────────────────────────────────
        if (!config.passes(snapshot.liquidityUsd, snapshot.volume24h, snapshot.priceChange24h)) {
            logger.debug(`[CLASSIFIER] Pair ${pair} filtered out: liquidity=${snapshot.liquidityUsd}, volume=${snapshot.volume24h}, change=${snapshot.priceChange24h}`);
            result.outcome = 'filtered';
            return result;
        }

        // ───────────────────────────────────────────────────────────────────────
        // 6. History append
        // ───────────────────────────────────────────────────────────────────────
        result.writes.history = {
            pairAddress: pair,
            priceUsd: snapshot.priceUsd,
            volume24h: snapshot.volume24h,
            liquidityUsd: snapshot.liquidityUsd,
            priceChange24h: snapshot.priceChange24h,
            timestamp: now,
        };

        // ───────────────────────────────────────────────────────────────────────
        // 7. Detection
        // ───────────────────────────────────────────────────────────────────────
        const detection = this.detect(snapshot, thresholdState, result.sharpeRatio, now);
        result.outcome = detection.outcome;
        result.signal = detection.signal;
        if (detection.event) {
            result.writes.events.push(detection.event);
        }

        return result;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // GATES
    // ═══════════════════════════════════════════════════════════════════════════

    private async isRatedGood(pairAddress: string): Promise<boolean> {
        try {
            const rating = await this.reputation.getRating(pairAddress);
            return rating.toLowerCase() === 'good';
        } catch (err: unknown) {
            logger.error(`[CLASSIFIER] RugCheck check failed for ${pairAddress}: ${errorMessage(err)}`);
            return false;
        }
    }

    private async hasFakeVolume(snapshot: PairSnapshot): Promise<boolean> {
        try {
            const verdict = await this.fakeVolume.check({
                chainId: snapshot.chainId,
                pairAddress: snapshot.pairAddress,
                volume24h: snapshot.volume24h,
                liquidityUsd: snapshot.liquidityUsd,
            });
            if (verdict.isFakeVolume) {
                logger.info(`[CLASSIFIER] Fake volume for ${snapshot.pairAddress}: ${verdict.reason ?? 'No reason'}`);
            }
            return verdict.isFakeVolume;
        } catch (err: unknown) {
            logger.error(`[CLASSIFIER] Fake volume check failed for ${snapshot.pairAddress}: ${errorMessage(err)}`);
            return false;
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DETECTION
    // ═══════════════════════════════════════════════════════════════════════════

    private detect(
        snapshot: PairSnapshot,
        thresholdState: ThresholdState,
        sharpeRatio: number,
        now: number
    ): { outcome: ClassificationOutcome; signal: TradeSignal | null; event: AnalysisEvent | null } {
        const pair = snapshot.pairAddress;
        const change = snapshot.priceChange24h;
        const thresholds = effectiveThresholds(thresholdState, this.thresholdConfig);

        if (change < thresholds.rug && snapshot.liquidityUsd < this.rules.rugMaxLiquidityUsd) {
            logger.info(`[CLASSIFIER] RUG pull detected: ${pair} change=${change}% liquidity=$${snapshot.liquidityUsd}`);
            return {
                outcome: 'rug',
                signal: null,
                event: this.event(pair, 'rug', now, {
                    price_change_24h: change,
                    liquidity_usd: snapshot.liquidityUsd,
                    threshold: thresholds.rug,
                    adjustment: thresholdState.adjustment,
                    sharpe_ratio: sharpeRatio,
                }),
            };
        }

        if (change > thresholds.pump && snapshot.volume24h > this.rules.pumpMinVolumeUsd) {
            const amount = this.sizer.size(snapshot.liquidityUsd);
            logger.info(`[CLASSIFIER] PUMP detected: ${pair} change=${change}% volume=$${snapshot.volume24h} size=${amount}`);
            return {
                outcome: 'pump',
                signal: {
                    pairAddress: pair,
                    action: 'buy',
                    amount,
                    reason: `pump: ${change}% on $${snapshot.volume24h} volume`,
                },
                event: this.event(pair, 'pump', now, {
                    price_change_24h: change,
                    volume_24h: snapshot.volume24h,
                    threshold: thresholds.pump,
                    adjustment: thresholdState.adjustment,
                    sharpe_ratio: sharpeRatio,
                }),
            };
        }

        if (change < this.rules.dipThreshold) {
            return {
                outcome: 'dip',
                signal: {
                    pairAddress: pair,
                    action: 'sell',
                    amount: this.rules.dipSellAmount,
                    reason: `dip: ${change}%`,
                },
                event: null,
            };
        }

        return { outcome: 'normal', signal: null, event: null };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // HELPERS
    // ═══════════════════════════════════════════════════════════════════════════

    private emptyResult(
        snapshot: PairSnapshot,
        history: readonly PriceHistoryRecord[],
        thresholdState: ThresholdState
    ): Classification {
        const writes: PairWrites = { upsertPair: null, history: null, events: [] };
        return {
            pairAddress: snapshot.pairAddress,
            outcome: 'normal',
            isNewPair: false,
            writes,
            signal: null,
            blacklistAdditions: [],
            sharpeRatio: historySharpeRatio(history, this.sharpeConfig),
            adjustment: thresholdState.adjustment,
        };
    }

    private skip(result: Classification, reason: SkipReason): Classification {
        result.outcome = 'skipped';
        result.skipReason = reason;
        return result;
    }

    private event(
        pairAddress: string,
        eventType: AnalysisEvent['eventType'],
        detectedAt: number,
        details: AnalysisEvent['details']
    ): AnalysisEvent {
        return { pairAddress, eventType, detectedAt, details };
    }
}
