/**
 * Single-instance lock for the scanner process.
 *
 * Two scanners sharing a working directory would both rewrite the config
 * file's blacklist and double every Telegram command. The lock file holds
 * `{ "pid": ..., "acquiredAt": "..." }`; a lock whose pid no longer runs is
 * stale and taken over.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

const LockFileSchema = z.object({
    pid: z.number().int().positive(),
    acquiredAt: z.string(),
});

export type LockHolder = z.infer<typeof LockFileSchema>;

export type AcquireResult =
    | { acquired: true; replacedStale: LockHolder | null }
    | { acquired: false; holder: LockHolder };

function pidIsAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

export class ProcessLock {
    readonly path: string;
    private readonly pid: number;
    private readonly isAlive: (pid: number) => boolean;

    constructor(path: string, pid: number = process.pid, isAlive: (pid: number) => boolean = pidIsAlive) {
        this.path = path;
        this.pid = pid;
        this.isAlive = isAlive;
    }

    /**
     * Current holder, or null when there is no lock file or it is unreadable.
     */
    holder(): LockHolder | null {
        let raw: string;
        try {
            raw = fs.readFileSync(this.path, 'utf8');
        } catch {
            return null;
        }

        try {
            const parsed = LockFileSchema.safeParse(JSON.parse(raw));
            return parsed.success ? parsed.data : null;
        } catch (err: unknown) {
            logger.warn(`[LOCK] Unreadable lock file ${this.path}: ${errorMessage(err)}`);
            return null;
        }
    }

    acquire(now: Date = new Date()): AcquireResult {
        const existing = this.holder();
        if (existing && existing.pid !== this.pid && this.isAlive(existing.pid)) {
            return { acquired: false, holder: existing };
        }

        const replacedStale = existing && existing.pid !== this.pid ? existing : null;
        if (replacedStale) {
            logger.warn(`[LOCK] Taking over stale lock from PID ${replacedStale.pid} (held since ${replacedStale.acquiredAt})`);
        }

        const record: LockHolder = { pid: this.pid, acquiredAt: now.toISOString() };
        fs.writeFileSync(this.path, JSON.stringify(record) + '\n', 'utf8');
        return { acquired: true, replacedStale };
    }

    /**
     * Removes the lock file only while this process holds it.
     */
    release(): boolean {
        const existing = this.holder();
        if (!existing || existing.pid !== this.pid) {
            return false;
        }
        fs.unlinkSync(this.path);
        return true;
    }
}
