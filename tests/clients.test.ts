/**
 * HTTP Client Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Reputation, fake-volume, market-data and Telegram clients against an axios
 * instance answered in-process.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { RugCheckClient } from '../src/services/reputation';
import { PocketUniverseClient } from '../src/services/fakeVolume';
import { DexScreenerClient } from '../src/services/dexscreener';
import { TelegramNotifier } from '../src/notifiers/telegram';
import { DeliveryError, OracleError } from '../src/utils/errors';
import { stubHttp } from './helpers';

describe('RugCheckClient', () => {
    test('asks for the pair by token_address and returns the raw rating', async () => {
        const { http, requests } = stubHttp(() => ({ data: { rating: 'Good' } }));

        const rating = await new RugCheckClient(http).getRating('0xpair1');

        expect(rating).toBe('Good');
        expect(requests).toHaveLength(1);
        expect(requests[0].method).toBe('get');
        expect(requests[0].params).toEqual({ token_address: '0xpair1' });
    });

    test('a missing rating reads as empty', async () => {
        const { http } = stubHttp(() => ({ data: {} }));
        expect(await new RugCheckClient(http).getRating('0xpair1')).toBe('');
    });

    test('an unusable payload is an OracleError', async () => {
        const { http } = stubHttp(() => ({ data: { rating: 5 } }));
        await expect(new RugCheckClient(http).getRating('0xpair1')).rejects.toThrow(OracleError);
    });

    test('non-2xx responses reject', async () => {
        const { http } = stubHttp(() => ({ status: 502, data: 'bad gateway' }));
        await expect(new RugCheckClient(http).getRating('0xpair1')).rejects.toThrow('Request failed with status code 502');
    });
});

describe('PocketUniverseClient', () => {
    test('posts chain, pair, volume and liquidity', async () => {
        const { http, requests } = stubHttp(() => ({ data: { is_fake_volume: true, reason: 'wash trading' } }));

        const verdict = await new PocketUniverseClient(http).check({
            chainId: 'bsc',
            pairAddress: '0xpair2',
            volume24h: 120000,
            liquidityUsd: 800,
        });

        expect(verdict).toEqual({ isFakeVolume: true, reason: 'wash trading' });
        expect(requests[0].method).toBe('post');
        expect(JSON.parse(requests[0].data)).toEqual({
            chain: 'bsc',
            pair_address: '0xpair2',
            volume_24h: 120000,
            liquidity_usd: 800,
        });
    });

    test('a missing flag reads as not fake', async () => {
        const { http } = stubHttp(() => ({ data: {} }));
        const verdict = await new PocketUniverseClient(http).check({
            chainId: 'bsc',
            pairAddress: '0xpair2',
            volume24h: 1,
            liquidityUsd: 1,
        });
        expect(verdict.isFakeVolume).toBe(false);
    });

    test('transport failures reject', async () => {
        const { http } = stubHttp(() => ({ networkError: true }));
        await expect(new PocketUniverseClient(http).check({
            chainId: 'bsc',
            pairAddress: '0xpair2',
            volume24h: 1,
            liquidityUsd: 1,
        })).rejects.toThrow('connect ECONNREFUSED');
    });
});

describe('DexScreenerClient', () => {
    test('lists a chain\'s pairs', async () => {
        const { http, requests } = stubHttp(() => ({ data: { pairs: [{ pairAddress: 'a' }, { pairAddress: 'b' }] } }));

        const pairs = await new DexScreenerClient(http).fetchChainPairs('ethereum');

        expect(pairs).toEqual([{ pairAddress: 'a' }, { pairAddress: 'b' }]);
        expect(requests[0].url).toBe('/ethereum');
    });

    test('a null pair list is empty', async () => {
        const { http } = stubHttp(() => ({ data: { pairs: null } }));
        expect(await new DexScreenerClient(http).fetchChainPairs('ethereum')).toEqual([]);
    });

    test('rate limiting and transport failures yield an empty list', async () => {
        const limited = stubHttp(() => ({ status: 429, data: {} }));
        const down = stubHttp(() => ({ networkError: true }));
        expect(await new DexScreenerClient(limited.http).fetchChainPairs('bsc')).toEqual([]);
        expect(await new DexScreenerClient(down.http).fetchChainPairs('bsc')).toEqual([]);
    });

    test('a single pair comes from pairs[0] or pair', async () => {
        const list = stubHttp(() => ({ data: { pairs: [{ pairAddress: '0xabc' }] } }));
        const single = stubHttp(() => ({ data: { pair: { pairAddress: '0xdef' } } }));

        expect(await new DexScreenerClient(list.http).fetchPair('bsc', '0xabc')).toEqual({ pairAddress: '0xabc' });
        expect(list.requests[0].url).toBe('/bsc/0xabc');
        expect(await new DexScreenerClient(single.http).fetchPair('bsc', '0xdef')).toEqual({ pairAddress: '0xdef' });
    });

    test('an unknown pair or malformed body is null', async () => {
        const empty = stubHttp(() => ({ data: { pairs: [] } }));
        const malformed = stubHttp(() => ({ data: 42 }));
        expect(await new DexScreenerClient(empty.http).fetchPair('bsc', '0xabc')).toBeNull();
        expect(await new DexScreenerClient(malformed.http).fetchPair('bsc', '0xabc')).toBeNull();
    });
});

describe('TelegramNotifier', () => {
    test('sends plain text to the configured chat', async () => {
        const { http, requests } = stubHttp(() => ({ data: { ok: true } }));

        await new TelegramNotifier(http, ' 12345 ').send('hello');

        expect(requests[0].url).toBe('/sendMessage');
        expect(JSON.parse(requests[0].data)).toEqual({
            chat_id: '12345',
            text: 'hello',
            disable_web_page_preview: true,
        });
    });

    test('a refusal is a DeliveryError carrying Telegram\'s description', async () => {
        const { http } = stubHttp(() => ({ status: 400, data: { ok: false, description: 'Bad Request: chat not found' } }));
        const send = new TelegramNotifier(http, '12345').send('hello');

        await expect(send).rejects.toThrow(DeliveryError);
        await expect(send).rejects.toThrow('Telegram HTTP 400: Bad Request: chat not found');
    });

    test('an unexpected body is a DeliveryError', async () => {
        const { http } = stubHttp(() => ({ status: 502, data: 'bad gateway' }));
        await expect(new TelegramNotifier(http, '12345').send('hello')).rejects.toThrow(
            'Telegram HTTP 502: unexpected response body'
        );
    });
});
