/**
 * Signal Outbox
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * FIFO between the engine (producer) and the SignalDispatcher (consumer).
 * Enqueueing never waits on delivery, so a slow chat API cannot stall the
 * scan loop.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { AnalysisEvent, TradeSignal } from '../types';

export interface PairContext {
    chainId: string;
    baseSymbol: string;
    priceUsd: number;
}

export type OutboxPayload =
    | { kind: 'trade'; signal: TradeSignal; pair: PairContext }
    | { kind: 'event'; event: AnalysisEvent; pair: PairContext }
    | { kind: 'notice'; text: string };

export type OutboxMessage = OutboxPayload & {
    id: string;
    attempts: number;
    enqueuedAt: number;
};

export class SignalOutbox {
    private queue: OutboxMessage[] = [];

    enqueue(payload: OutboxPayload, now: number = Date.now()): string {
        const id = uuidv4();
        this.queue.push({ ...payload, id, attempts: 0, enqueuedAt: now });
        return id;
    }

    /**
     * Put a message back after a failed delivery attempt.
     */
    requeue(message: OutboxMessage): void {
        this.queue.push({ ...message, attempts: message.attempts + 1 });
    }

    /**
     * Remove and return everything queued so far, oldest first.
     */
    drain(): OutboxMessage[] {
        const drained = this.queue;
        this.queue = [];
        return drained;
    }

    get size(): number {
        return this.queue.length;
    }
}
