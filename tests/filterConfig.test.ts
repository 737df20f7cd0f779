/**
 * Filter Config + Config Store Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FilterConfig.passes() bounds, validation of the bounds themselves, and the
 * config file round trip (defaults, partial files, blacklist write-back).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FilterConfig } from '../src/config/filterConfig';
import { ConfigStore } from '../src/config/configStore';
import { PersistenceError } from '../src/utils/errors';

describe('FilterConfig', () => {
    test('defaults to 1000 liquidity, 10000 volume, -1000% change', () => {
        expect(new FilterConfig().toJSON()).toEqual({
            minLiquidity: 1000,
            minVolume24h: 10000,
            minPriceChange: -1000,
        });
    });

    test('bounds are inclusive', () => {
        const filters = new FilterConfig();
        expect(filters.passes(1000, 10000, -1000)).toBe(true);
        expect(filters.passes(999.99, 10000, 0)).toBe(false);
        expect(filters.passes(1000, 9999, 0)).toBe(false);
        expect(filters.passes(1000, 10000, -1000.5)).toBe(false);
    });

    test('raising any bound never admits more pairs', () => {
        const loose = new FilterConfig({ minLiquidity: 500, minVolume24h: 5000, minPriceChange: -50 });
        const strict = new FilterConfig({ minLiquidity: 2000, minVolume24h: 20000, minPriceChange: 0 });
        const samples: Array<[number, number, number]> = [
            [400, 6000, 10],
            [600, 6000, -10],
            [2500, 25000, 5],
            [2500, 15000, 5],
            [10000, 100000, -60],
        ];

        for (const [liquidity, volume, change] of samples) {
            if (strict.passes(liquidity, volume, change)) {
                expect(loose.passes(liquidity, volume, change)).toBe(true);
            }
        }
        expect(samples.filter(s => loose.passes(...s)).length).toBe(3);
        expect(samples.filter(s => strict.passes(...s)).length).toBe(1);
    });

    test('rejects negative liquidity and non-finite bounds', () => {
        expect(() => new FilterConfig({ minLiquidity: -1 })).toThrow();
        expect(() => new FilterConfig({ minVolume24h: Number.POSITIVE_INFINITY })).toThrow();
        expect(() => new FilterConfig({ minPriceChange: Number.NaN })).toThrow();
    });
});

describe('ConfigStore', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanner-config-'));
        file = path.join(dir, 'config.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('load', () => {
        test('missing file yields defaults', () => {
            const settings = new ConfigStore(file).load();
            expect(settings.source).toBe('defaults');
            expect(settings.filters.toJSON()).toEqual({ minLiquidity: 1000, minVolume24h: 10000, minPriceChange: -1000 });
            expect(settings.blacklistedCoins).toEqual([]);
            expect(settings.blacklistedDevs).toEqual([]);
        });

        test('unparseable JSON yields defaults', () => {
            fs.writeFileSync(file, '{ "filters": ');
            const settings = new ConfigStore(file).load();
            expect(settings.source).toBe('defaults');
        });

        test('a bound that breaks FilterConfig yields defaults', () => {
            fs.writeFileSync(file, JSON.stringify({ filters: { min_liquidity: -5 }, blacklisted_coins: ['SCAM'] }));
            const settings = new ConfigStore(file).load();
            expect(settings.source).toBe('defaults');
            expect(settings.blacklistedCoins).toEqual([]);
        });

        test('missing keys take their individual defaults', () => {
            fs.writeFileSync(file, JSON.stringify({ filters: { min_liquidity: 500 }, blacklisted_devs: ['0xbad'] }));
            const settings = new ConfigStore(file).load();
            expect(settings.source).toBe('file');
            expect(settings.filters.toJSON()).toEqual({ minLiquidity: 500, minVolume24h: 10000, minPriceChange: -1000 });
            expect(settings.blacklistedCoins).toEqual([]);
            expect(settings.blacklistedDevs).toEqual(['0xbad']);
        });

        test('wrong value types yield defaults', () => {
            fs.writeFileSync(file, JSON.stringify({ blacklisted_coins: 'SCAM' }));
            expect(new ConfigStore(file).load().source).toBe('defaults');
        });
    });

    describe('saveBlacklistedCoins', () => {
        test('keeps every other key of the file', () => {
            fs.writeFileSync(file, JSON.stringify({ filters: { min_liquidity: 500 }, custom: true, blacklisted_coins: ['OLD'] }));

            new ConfigStore(file).saveBlacklistedCoins(['OLD', 'SCAM', '0xpair']);

            const text = fs.readFileSync(file, 'utf8');
            expect(text.endsWith('}\n')).toBe(true);
            expect(JSON.parse(text)).toEqual({
                filters: { min_liquidity: 500 },
                custom: true,
                blacklisted_coins: ['OLD', 'SCAM', '0xpair'],
            });
        });

        test('creates the file when missing, readable by load()', () => {
            const store = new ConfigStore(file);
            store.saveBlacklistedCoins(['SCAM']);

            expect(fs.readFileSync(file, 'utf8')).toBe('{\n    "blacklisted_coins": [\n        "SCAM"\n    ]\n}\n');
            const settings = store.load();
            expect(settings.source).toBe('file');
            expect(settings.blacklistedCoins).toEqual(['SCAM']);
        });

        test('refuses to overwrite a corrupted file', () => {
            fs.writeFileSync(file, 'not json');
            expect(() => new ConfigStore(file).saveBlacklistedCoins(['SCAM'])).toThrow(PersistenceError);
            expect(fs.readFileSync(file, 'utf8')).toBe('not json');
        });

        test('refuses a file whose top level is not an object', () => {
            fs.writeFileSync(file, '[1, 2]');
            expect(() => new ConfigStore(file).saveBlacklistedCoins(['SCAM'])).toThrow(
                'saveBlacklistedCoins: top-level value is not an object'
            );
        });
    });
});
