/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS: THIN ORCHESTRATION LAYER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds the object graph from a DefaultConfig:
 *
 *   ConfigStore ─┐
 *   oracles ─────┼─► AnomalyClassifier ─► AnalysisEngine ─► SignalOutbox
 *   store ───────┘                              ▲                 │
 *                                               │                 ▼
 *   DexScreener ─────────────► ScanLoop ────────┘         SignalDispatcher ─► Notifier
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. Nothing starts until main() is called
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DefaultConfig } from './config/default';
import { ConfigStore } from './config/configStore';
import { AnomalyClassifier } from './engine/anomalyClassifier';
import { AnalysisEngine } from './engine/analysisEngine';
import { AdaptiveThresholdTracker } from './risk/adaptive_thresholds';
import { RiskSizer } from './risk/riskSizer';
import { DEFAULT_SHARPE_CONFIG } from './risk/sharpe';
import { RugCheckClient } from './services/reputation';
import { PocketUniverseClient } from './services/fakeVolume';
import { DexScreenerClient } from './services/dexscreener';
import { createPersistenceStore, PersistenceStore } from './storage';
import { SignalOutbox } from './notifiers/outbox';
import { SignalDispatcher } from './notifiers/dispatcher';
import { LogNotifier, Notifier, TelegramNotifier } from './notifiers/telegram';
import { ScanLoop } from './runtime/scanLoop';
import logger from './utils/logger';

export interface Scanner {
    engine: AnalysisEngine;
    scanLoop: ScanLoop;
    dispatcher: SignalDispatcher;
    outbox: SignalOutbox;
    store: PersistenceStore;
}

function createNotifier(config: DefaultConfig): Notifier {
    if (config.TELEGRAM_TOKEN && config.TELEGRAM_CHAT_ID) {
        return TelegramNotifier.create(config.TELEGRAM_TOKEN, config.TELEGRAM_CHAT_ID);
    }
    logger.warn('[STARTUP] TELEGRAM_TOKEN / TELEGRAM_CHAT_ID not set, notifications go to the log only');
    return new LogNotifier();
}

/**
 * Wire every component. Nothing runs until the loop and dispatcher are started.
 */
export function createScanner(config: DefaultConfig): Scanner {
    const store = createPersistenceStore(config.SUPABASE_URL, config.SUPABASE_KEY);
    const configStore = new ConfigStore(config.CONFIG_FILE);
    const settings = configStore.load();
    logger.info(`[STARTUP] Scanner config from ${settings.source === 'file' ? config.CONFIG_FILE : 'defaults'}: ${JSON.stringify(settings.filters.toJSON())}`);

    const classifier = new AnomalyClassifier({
        reputation: RugCheckClient.create(config.RUGCHECK_URL),
        fakeVolume: PocketUniverseClient.create(config.FAKE_VOLUME_URL),
        pairs: store,
        sizer: new RiskSizer({
            positionFraction: config.POSITION_FRACTION,
            portfolioValue: config.PORTFOLIO_VALUE_USD,
        }),
        sharpeConfig: { ...DEFAULT_SHARPE_CONFIG, riskFreeRate: config.RISK_FREE_RATE },
    });

    const outbox = new SignalOutbox();
    const engine = new AnalysisEngine({
        classifier,
        store,
        blacklistSink: configStore,
        outbox,
        tracker: new AdaptiveThresholdTracker(),
        settings,
    });

    const dispatcher = new SignalDispatcher(outbox, createNotifier(config), store, {
        traderBot: config.TRADER_BOT,
        feeRate: config.TRADE_FEE_RATE,
    });

    const scanLoop = new ScanLoop(engine, DexScreenerClient.create(config.DEXSCREENER_URL), configStore, {
        chains: config.CHAINS,
        watchPairs: config.WATCH_PAIRS,
        pairDelayMs: config.PAIR_DELAY_MS,
        intervalMs: config.SCAN_INTERVAL_MS,
    });

    return { engine, scanLoop, dispatcher, outbox, store };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY, CALLED BY start.ts
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Start the dispatcher and the scan loop. The returned promise settles when
 * the loop exits.
 */
export function main(scanner: Scanner): Promise<void> {
    logger.info('');
    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info('🚀 STARTING DEX ANOMALY SCANNER MAIN LOOP');
    logger.info('═══════════════════════════════════════════════════════════════════');

    scanner.dispatcher.start();
    return scanner.scanLoop.start();
}
