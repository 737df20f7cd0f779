import 'dotenv/config';

import * as path from 'path';
import { DEFAULT_CONFIG } from './config/default';
import { createScanner, main, Scanner } from './index';
import { ProcessLock } from './runtime/processLock';
import logger from './utils/logger';
import { errorMessage } from './utils/errors';

const processLock = new ProcessLock(path.join(process.cwd(), '.dex-scanner.lock'));

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let scanner: Scanner | null = null;
let isShuttingDown = false;

function releaseProcessLock(): void {
    try {
        processLock.release();
    } catch (err: unknown) {
        console.error(`[SHUTDOWN] Failed to release process lock: ${errorMessage(err)}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop scan loop (waits for the current pair)
 * 2. Stop dispatcher and deliver what is still queued
 * 3. Flush logs
 * 4. Release process lock
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        console.log(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }

    isShuttingDown = true;

    console.log('');
    console.log('════════════════════════════════════════════════════════════════');
    console.log(`🛑 [SHUTDOWN] Received ${signal}, initiating graceful shutdown...`);
    console.log('════════════════════════════════════════════════════════════════');

    try {
        if (scanner) {
            console.log('[SHUTDOWN] Step 1: Stopping scan loop...');
            await scanner.scanLoop.stop();
            console.log('[SHUTDOWN] ✅ Scan loop stopped');

            console.log(`[SHUTDOWN] Step 2: Draining outbox (${scanner.outbox.size} queued)...`);
            const summary = await scanner.dispatcher.stop();
            console.log(`[SHUTDOWN] ✅ Dispatcher stopped: delivered=${summary.delivered} requeued=${summary.requeued} dropped=${summary.dropped}`);
        }

        console.log('[SHUTDOWN] Step 3: Flushing logs...');
        await new Promise(resolve => setTimeout(resolve, 500));
        console.log('[SHUTDOWN] ✅ Logs flushed');

        console.log('[SHUTDOWN] Step 4: Releasing process lock...');
        releaseProcessLock();
        console.log('[SHUTDOWN] ✅ Process lock released');

        console.log('');
        console.log('════════════════════════════════════════════════════════════════');
        console.log('✅ [SHUTDOWN] Graceful shutdown complete');
        console.log('════════════════════════════════════════════════════════════════');

        process.exit(0);
    } catch (err: unknown) {
        console.error(`[SHUTDOWN] ❌ Error during shutdown: ${errorMessage(err)}`);
        releaseProcessLock();
        process.exit(1);
    }
}

function shutdownOrExit(signal: string): void {
    gracefulShutdown(signal).catch((err: unknown) => {
        console.error(`[SHUTDOWN] ❌ ${errorMessage(err)}`);
        releaseProcessLock();
        process.exit(1);
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function attachProcessHandlers(): void {
    process.on('SIGINT', () => shutdownOrExit('SIGINT'));
    process.on('SIGTERM', () => shutdownOrExit('SIGTERM'));

    process.on('uncaughtException', (error) => {
        console.error('');
        console.error('════════════════════════════════════════════════════════════════');
        console.error(`🚨 [FATAL] Uncaught Exception: ${error.message}`);
        console.error('════════════════════════════════════════════════════════════════');
        console.error(error.stack);
        shutdownOrExit('uncaughtException');
    });

    // Log but don't exit
    process.on('unhandledRejection', (reason) => {
        logger.error(`[FATAL] Unhandled rejection: ${errorMessage(reason)}`);
    });

    process.on('exit', () => {
        releaseProcessLock();
    });

    console.log('[STARTUP] ✅ Process handlers attached');
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

async function run(): Promise<void> {
    console.log('');
    console.log('════════════════════════════════════════════════════════════════');
    console.log('🔧 DEX ANOMALY SCANNER STARTING');
    console.log('════════════════════════════════════════════════════════════════');
    console.log(`   PID: ${process.pid}`);
    console.log(`   Time: ${new Date().toISOString()}`);
    console.log(`   Env: ${DEFAULT_CONFIG.ENV}`);
    console.log('════════════════════════════════════════════════════════════════');

    console.log('[STARTUP] Step 0: Checking for existing instance...');
    const lock = processLock.acquire();
    if (!lock.acquired) {
        console.error(`🚫 Scanner PID ${lock.holder.pid} has been running since ${lock.holder.acquiredAt}.`);
        console.error(`   Stop it or remove ${path.basename(processLock.path)} manually.`);
        process.exit(0);
    }
    console.log('[STARTUP] ✅ Process lock acquired');

    attachProcessHandlers();

    console.log('[STARTUP] Step 1: Wiring components...');
    scanner = createScanner(DEFAULT_CONFIG);
    console.log(`[STARTUP] ✅ Chains: ${DEFAULT_CONFIG.CHAINS.join(', ')} | watched pairs: ${DEFAULT_CONFIG.WATCH_PAIRS.length}`);

    console.log('[STARTUP] Step 2: Starting scan loop...');
    await main(scanner);
}

run().catch((err: unknown) => {
    logger.error(`[FATAL] Startup failed: ${errorMessage(err)}`);
    releaseProcessLock();
    process.exit(1);
});
