/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SCAN LOOP: THE ONLY RUNTIME DRIVER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One cycle:
 *   1. reload the scanner config file (filters + blacklists)
 *   2. refresh adaptive thresholds from the last 6h of history
 *   3. for each chain, fetch its pairs and process them one by one with a
 *      fixed delay between pairs
 *   4. fetch and process each individually watched pair
 *
 * Pairs are processed strictly sequentially. stop() lets the current pair
 * finish, then the cycle ends early.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { ClassificationOutcome } from '../types';
import { AnalysisEngine } from '../engine/analysisEngine';
import { MarketDataSource } from '../services/dexscreener';
import { ConfigStore } from '../config/configStore';
import { WatchedPair } from '../config/default';
import { SCANNER_CONFIG } from '../config/constants';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScanLoopOptions {
    chains: readonly string[];
    watchPairs: readonly WatchedPair[];
    pairDelayMs: number;
    intervalMs: number;
}

export type CycleStats = Record<ClassificationOutcome | 'malformed', number> & {
    cycleId: string;
    pairs: number;
    durationMs: number;
};

const DEFAULT_OPTIONS: ScanLoopOptions = {
    chains: SCANNER_CONFIG.CHAINS,
    watchPairs: [],
    pairDelayMs: SCANNER_CONFIG.PAIR_DELAY_MS,
    intervalMs: SCANNER_CONFIG.SCAN_INTERVAL_MS,
};

function generateCycleId(): string {
    const timestamp = Date.now();
    const uuid = uuidv4().split('-')[0];
    return `cycle_${timestamp}_${uuid}`;
}

function emptyStats(cycleId: string): CycleStats {
    return {
        cycleId,
        pairs: 0,
        durationMs: 0,
        malformed: 0,
        skipped: 0,
        filtered: 0,
        normal: 0,
        rug: 0,
        pump: 0,
        dip: 0,
    };
}

export class ScanLoop {
    // ═══════════════════════════════════════════════════════════════════════════
    // INSTANCE STATE
    // ═══════════════════════════════════════════════════════════════════════════

    private readonly engine: AnalysisEngine;
    private readonly marketData: MarketDataSource;
    private readonly configStore: ConfigStore;
    private readonly options: ScanLoopOptions;

    private isScanning: boolean = false;
    private isRunning: boolean = false;
    private stopRequested: boolean = false;
    private cycleCount: number = 0;

    private loopTimeout: ReturnType<typeof setTimeout> | null = null;
    private wakeUp: (() => void) | null = null;

    // ═══════════════════════════════════════════════════════════════════════════
    // CONSTRUCTOR
    // ═══════════════════════════════════════════════════════════════════════════

    constructor(
        engine: AnalysisEngine,
        marketData: MarketDataSource,
        configStore: ConfigStore,
        options: Partial<ScanLoopOptions> = {}
    ) {
        this.engine = engine;
        this.marketData = marketData;
        this.configStore = configStore;
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PUBLIC API
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Run cycles until stop() is called. Resolves once the loop has exited.
     */
    async start(): Promise<void> {
        if (this.isRunning) {
            logger.warn('[SCAN-LOOP] Already running, ignoring start()');
            return;
        }

        this.isRunning = true;
        this.stopRequested = false;
        logger.info(`[SCAN-LOOP] Starting: chains=${this.options.chains.join(',')} watched=${this.options.watchPairs.length} interval=${this.options.intervalMs}ms`);

        while (!this.stopRequested) {
            try {
                await this.runCycle();
            } catch (err: unknown) {
                logger.error(`[SCAN-LOOP] Cycle failed: ${errorMessage(err)}`);
            }

            if (this.stopRequested) break;
            logger.info(`[SCAN-LOOP] Completed scan of ${this.options.chains.join(', ')}. Sleeping for ${Math.round(this.options.intervalMs / 1000)}s.`);
            await this.sleep(this.options.intervalMs);
        }

        this.isRunning = false;
        logger.info('[SCAN-LOOP] ✅ Stopped');
    }

    /**
     * Request a stop and wait for the current pair to finish.
     */
    async stop(): Promise<void> {
        if (!this.isRunning) {
            logger.info('[SCAN-LOOP] Not running, ignoring stop()');
            return;
        }

        logger.info('[SCAN-LOOP] 🛑 Stop requested, waiting for current pair to complete...');
        this.stopRequested = true;

        // Cancel pending sleep
        if (this.loopTimeout) {
            clearTimeout(this.loopTimeout);
            this.loopTimeout = null;
        }
        if (this.wakeUp) {
            this.wakeUp();
            this.wakeUp = null;
        }

        const maxWait = 60_000;
        const startWait = Date.now();
        while (this.isRunning && Date.now() - startWait < maxWait) {
            await new Promise(resolve => setTimeout(resolve, 100));
        }

        if (this.isRunning) {
            logger.warn('[SCAN-LOOP] ⚠️ Force stopping after timeout');
        }
    }

    /**
     * One full pass over every chain and watched pair.
     */
    async runCycle(): Promise<CycleStats> {
        const cycleId = generateCycleId();
        const stats = emptyStats(cycleId);
        const startedAt = Date.now();
        this.isScanning = true;
        this.cycleCount++;

        try {
            this.engine.applySettings(this.configStore.load());
            await this.engine.refreshThresholds();

            for (const chain of this.options.chains) {
                if (this.stopRequested) break;
                const pairs = await this.marketData.fetchChainPairs(chain);
                logger.info(`[SCAN-LOOP] ${cycleId} ${chain}: ${pairs.length} pair(s)`);

                for (const raw of pairs) {
                    if (this.stopRequested) break;
                    await this.processOne(raw, stats);
                }
            }

            for (const watched of this.options.watchPairs) {
                if (this.stopRequested) break;
                const raw = await this.marketData.fetchPair(watched.chainId, watched.pairAddress);
                if (raw === null) {
                    stats.malformed++;
                    continue;
                }
                await this.processOne(raw, stats);
            }
        } finally {
            this.isScanning = false;
            stats.durationMs = Date.now() - startedAt;
        }

        logger.info(
            `[SCAN-LOOP] ${cycleId} done in ${stats.durationMs}ms: pairs=${stats.pairs} ` +
            `skipped=${stats.skipped} filtered=${stats.filtered} normal=${stats.normal} ` +
            `rug=${stats.rug} pump=${stats.pump} dip=${stats.dip} malformed=${stats.malformed}`
        );
        return stats;
    }

    isLoopRunning(): boolean {
        return this.isRunning;
    }

    isCycleInProgress(): boolean {
        return this.isScanning;
    }

    getCycleCount(): number {
        return this.cycleCount;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private async processOne(raw: unknown, stats: CycleStats): Promise<void> {
        stats.pairs++;
        const classification = await this.engine.processRawPair(raw);
        if (classification === null) {
            stats.malformed++;
        } else {
            stats[classification.outcome]++;
        }

        if (this.options.pairDelayMs > 0) {
            await this.sleep(this.options.pairDelayMs);
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.wakeUp = resolve;
            this.loopTimeout = setTimeout(() => {
                this.loopTimeout = null;
                this.wakeUp = null;
                resolve();
            }, ms);
        });
    }
}
