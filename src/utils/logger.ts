/**
 * Scanner logger.
 *
 * Console always, log files outside tests, and a Supabase mirror of
 * the lines an operator needs after the fact: warnings, errors and detections
 * (rugs, pumps, blacklist growth, trades) land in `bot_logs` with their
 * `[TAG]` split out.
 */

import winston from 'winston';
import Transport from 'winston-transport';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

const IS_TEST = process.env.NODE_ENV === 'test';
const LOG_DIR = process.env.LOG_DIR || '.';

// ═══════════════════════════════════════════════════════════════════════════════
// CRITICAL LINES
// ═══════════════════════════════════════════════════════════════════════════════

/** Detection markers mirrored to bot_logs alongside warnings and errors. */
export const CRITICAL_MARKERS = ['RUG', 'PUMP', 'BLACKLIST', 'TRADE'] as const;

export type BotLogRow = {
    action: string;
    details: { tag: string | null; message: string };
    timestamp: string;
};

export function isCriticalLine(level: string, message: string): boolean {
    if (level === 'error' || level === 'warn') return true;
    return CRITICAL_MARKERS.some(marker => message.includes(marker));
}

/**
 * `[DISPATCH] Sent trade` → tag "DISPATCH", message "Sent trade".
 */
export function toBotLogRow(level: string, message: string, at: Date): BotLogRow {
    const tagged = /^\[([A-Z0-9_-]+)\]\s*(.*)$/s.exec(message);
    return {
        action: level,
        details: tagged ? { tag: tagged[1], message: tagged[2] } : { tag: null, message },
        timestamp: at.toISOString(),
    };
}

class BotLogTransport extends Transport {
    private readonly client: SupabaseClient;

    constructor(opts: Transport.TransportStreamOptions & { client: SupabaseClient }) {
        super(opts);
        this.client = opts.client;
    }

    log(info: { level: string; message: unknown }, callback: () => void) {
        setImmediate(() => this.emit('logged', info));

        const message = String(info.message);
        if (isCriticalLine(info.level, message)) {
            Promise.resolve(this.client.from('bot_logs').insert(toBotLogRow(info.level, message, new Date())))
                .then(({ error }) => {
                    if (error) console.error(`[LOGGING] bot_logs insert refused: ${error.message}`);
                })
                .catch((err: unknown) => {
                    // Console only: routing this through winston would loop back here.
                    console.error(`[LOGGING] bot_logs insert failed: ${err instanceof Error ? err.message : String(err)}`);
                });
        }

        callback();
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSPORTS
// ═══════════════════════════════════════════════════════════════════════════════

function botLogClient(): SupabaseClient | null {
    const url = process.env.SUPABASE_URL;
    const key = process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_KEY;
    if (IS_TEST || !url || !key) return null;

    try {
        return createClient(url, key, { auth: { persistSession: false, autoRefreshToken: false } });
    } catch (err: unknown) {
        console.log(`[LOGGING] bot_logs mirror disabled: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }
}

const transports: winston.transport[] = [
    new winston.transports.Console({
        silent: IS_TEST,
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp }) => `${timestamp} ${level} ${message}`)
        ),
    }),
];

if (!IS_TEST) {
    transports.push(
        new winston.transports.File({ filename: `${LOG_DIR}/scanner-error.log`, level: 'error' }),
        new winston.transports.File({ filename: `${LOG_DIR}/scanner.log` }),
    );
}

const client = botLogClient();
if (client) {
    transports.push(new BotLogTransport({ client }));
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports,
});

export default logger;
