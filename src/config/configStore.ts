/**
 * Scanner Config Store
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * JSON file holding the admission filters and the blacklists:
 *
 *   {
 *     "filters": { "min_liquidity": 1000, "min_volume_24h": 10000, "min_price_change": -1000 },
 *     "blacklisted_coins": ["SCAM", "0xpair..."],
 *     "blacklisted_devs": ["0xwallet..."]
 *   }
 *
 * A missing file, unparseable JSON or a bound that breaks the FilterConfig
 * invariants yields the defaults, reported as `source: 'defaults'` so a
 * running engine can keep what it has. Keys absent from an otherwise valid
 * file take their individual defaults.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import { z } from 'zod';
import { FilterConfig } from './filterConfig';
import { DEFAULT_FILTERS } from './constants';
import logger from '../utils/logger';
import { errorMessage, PersistenceError } from '../utils/errors';

const ConfigFileSchema = z.object({
    filters: z.object({
        min_liquidity: z.number().optional(),
        min_volume_24h: z.number().optional(),
        min_price_change: z.number().optional(),
    }).optional(),
    blacklisted_coins: z.array(z.string()).optional(),
    blacklisted_devs: z.array(z.string()).optional(),
}).passthrough();

export interface ScannerSettings {
    filters: FilterConfig;
    blacklistedCoins: string[];
    blacklistedDevs: string[];
    source: 'file' | 'defaults';
}

export function defaultSettings(): ScannerSettings {
    return {
        filters: new FilterConfig(),
        blacklistedCoins: [],
        blacklistedDevs: [],
        source: 'defaults',
    };
}

export class ConfigStore {
    readonly path: string;

    constructor(path: string) {
        this.path = path;
    }

    load(): ScannerSettings {
        let raw: string;
        try {
            raw = fs.readFileSync(this.path, 'utf8');
        } catch (err: unknown) {
            logger.warn(`[CONFIG] Config load failed (${this.path}): ${errorMessage(err)}. Using defaults.`);
            return defaultSettings();
        }

        try {
            const file = ConfigFileSchema.parse(JSON.parse(raw));
            const filters = new FilterConfig({
                minLiquidity: file.filters?.min_liquidity ?? DEFAULT_FILTERS.minLiquidity,
                minVolume24h: file.filters?.min_volume_24h ?? DEFAULT_FILTERS.minVolume24h,
                minPriceChange: file.filters?.min_price_change ?? DEFAULT_FILTERS.minPriceChange,
            });
            return {
                filters,
                blacklistedCoins: file.blacklisted_coins ?? [],
                blacklistedDevs: file.blacklisted_devs ?? [],
                source: 'file',
            };
        } catch (err: unknown) {
            logger.warn(`[CONFIG] Config parse failed (${this.path}): ${errorMessage(err)}. Using defaults.`);
            return defaultSettings();
        }
    }

    /**
     * Rewrite blacklisted_coins, keeping every other key of the file.
     * Creates the file when it does not exist yet.
     */
    saveBlacklistedCoins(coins: readonly string[]): void {
        let document: Record<string, unknown> = {};

        if (fs.existsSync(this.path)) {
            try {
                const parsed: unknown = JSON.parse(fs.readFileSync(this.path, 'utf8'));
                if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
                    throw new Error('top-level value is not an object');
                }
                document = { ...parsed };
            } catch (err: unknown) {
                // Leave a corrupted file for the operator instead of clobbering it
                throw new PersistenceError('saveBlacklistedCoins', errorMessage(err));
            }
        }

        document.blacklisted_coins = [...coins];

        try {
            fs.writeFileSync(this.path, JSON.stringify(document, null, 4) + '\n', 'utf8');
        } catch (err: unknown) {
            throw new PersistenceError('saveBlacklistedCoins', errorMessage(err));
        }
    }
}
