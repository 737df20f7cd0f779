/**
 * Signal Dispatcher
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Drains the SignalOutbox on its own timer and delivers each message through
 * the Notifier:
 *
 *   trade   → "@<trader bot> /<action> <pair> <amount> <chain>", then a
 *             confirmation line, then a trades row
 *   event   → one plain notification per new / rug / pump event
 *   notice  → the text as-is
 *
 * A failed delivery goes back to the outbox until it has been tried
 * `maxAttempts` times. Delivery outcome never feeds back into detection.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AnalysisEvent, TradeSignal } from '../types';
import { SCANNER_CONFIG } from '../config/constants';
import { PersistenceStore } from '../storage/persistence';
import { Notifier } from './telegram';
import { OutboxMessage, PairContext, SignalOutbox } from './outbox';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface DispatcherOptions {
    traderBot: string;
    feeRate: number;
    maxAttempts: number;
    now: () => number;
}

export interface DispatchSummary {
    delivered: number;
    requeued: number;
    dropped: number;
}

const DEFAULT_OPTIONS: DispatcherOptions = {
    traderBot: 'ToxiSolanaBot',
    feeRate: 0,
    maxAttempts: SCANNER_CONFIG.DISPATCH_MAX_ATTEMPTS,
    now: Date.now,
};

// ═══════════════════════════════════════════════════════════════════════════════
// MESSAGE TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function formatTradeCommand(traderBot: string, signal: TradeSignal, chainId: string): string {
    return `@${traderBot} /${signal.action} ${signal.pairAddress} ${signal.amount} ${chainId}`;
}

export function formatTradeConfirmation(signal: TradeSignal, baseSymbol: string): string {
    return `${signal.action.toUpperCase()} executed for ${baseSymbol} (${signal.pairAddress}): ${signal.amount} units`;
}

export function formatEventMessage(event: AnalysisEvent, pair: PairContext): string {
    const d = event.details;
    const label = `${pair.baseSymbol} (${event.pairAddress}) on ${pair.chainId}`;
    switch (event.eventType) {
        case 'new':
            return `New pair: ${label}, ${d.age_hours}h old`;
        case 'rug':
            return `RUG pull: ${label}, ${d.price_change_24h}% in 24h with $${d.liquidity_usd} liquidity`;
        case 'pump':
            return `PUMP: ${label}, +${d.price_change_24h}% in 24h on $${d.volume_24h} volume`;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER
// ═══════════════════════════════════════════════════════════════════════════════

export class SignalDispatcher {
    private readonly outbox: SignalOutbox;
    private readonly notifier: Notifier;
    private readonly store: PersistenceStore;
    private readonly options: DispatcherOptions;

    private intervalHandle: ReturnType<typeof setInterval> | null = null;
    private inFlight: Promise<DispatchSummary> | null = null;

    constructor(
        outbox: SignalOutbox,
        notifier: Notifier,
        store: PersistenceStore,
        options: Partial<DispatcherOptions> = {}
    ) {
        this.outbox = outbox;
        this.notifier = notifier;
        this.store = store;
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    /**
     * Deliver everything currently queued. Concurrent calls share one pass.
     */
    flush(): Promise<DispatchSummary> {
        if (!this.inFlight) {
            this.inFlight = this.deliverAll().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    start(intervalMs: number = SCANNER_CONFIG.DISPATCH_INTERVAL_MS): void {
        if (this.intervalHandle) {
            logger.warn('[DISPATCH] Already running, ignoring start()');
            return;
        }

        this.intervalHandle = setInterval(() => {
            this.flush().catch((err: unknown) => {
                logger.error(`[DISPATCH] Flush failed: ${errorMessage(err)}`);
            });
        }, intervalMs);

        logger.info(`[DISPATCH] Started with interval ${intervalMs}ms`);
    }

    /**
     * Stop the timer and deliver what is still queued.
     */
    async stop(): Promise<DispatchSummary> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        return this.flush();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DELIVERY
    // ═══════════════════════════════════════════════════════════════════════════

    private async deliverAll(): Promise<DispatchSummary> {
        const summary: DispatchSummary = { delivered: 0, requeued: 0, dropped: 0 };

        for (const message of this.outbox.drain()) {
            try {
                await this.deliver(message);
                summary.delivered++;
            } catch (err: unknown) {
                if (message.attempts + 1 < this.options.maxAttempts) {
                    logger.warn(`[DISPATCH] Delivery of ${message.kind} ${message.id} failed (attempt ${message.attempts + 1}): ${errorMessage(err)}`);
                    this.outbox.requeue(message);
                    summary.requeued++;
                } else {
                    logger.error(`[DISPATCH] Dropping ${message.kind} ${message.id} after ${message.attempts + 1} attempts: ${errorMessage(err)}`);
                    summary.dropped++;
                }
            }
        }

        return summary;
    }

    private async deliver(message: OutboxMessage): Promise<void> {
        switch (message.kind) {
            case 'trade':
                await this.deliverTrade(message.signal, message.pair);
                return;
            case 'event':
                await this.notifier.send(formatEventMessage(message.event, message.pair));
                return;
            case 'notice':
                await this.notifier.send(message.text);
                return;
        }
    }

    private async deliverTrade(signal: TradeSignal, pair: PairContext): Promise<void> {
        if (!(signal.amount > 0)) {
            logger.info(`[DISPATCH] Skipping zero-size ${signal.action} for ${signal.pairAddress}`);
            return;
        }

        // Only the command is retried; after it went out, later failures are logged
        await this.notifier.send(formatTradeCommand(this.options.traderBot, signal, pair.chainId));
        logger.info(`[DISPATCH] TRADE ${signal.action} sent for ${signal.pairAddress} via ${this.options.traderBot}: ${signal.amount}`);

        try {
            await this.notifier.send(formatTradeConfirmation(signal, pair.baseSymbol));
        } catch (err: unknown) {
            logger.error(`[DISPATCH] Trade confirmation failed for ${signal.pairAddress}: ${errorMessage(err)}`);
        }

        try {
            await this.store.recordTrade({
                pairAddress: signal.pairAddress,
                action: signal.action,
                amount: signal.amount,
                price: pair.priceUsd,
                fee: signal.amount * pair.priceUsd * this.options.feeRate,
                timestamp: this.options.now(),
            });
        } catch (err: unknown) {
            logger.error(`[DISPATCH] Failed to record trade for ${signal.pairAddress}: ${errorMessage(err)}`);
        }
    }
}
