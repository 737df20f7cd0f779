/**
 * Supabase Store Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A real supabase-js client whose fetch is answered in-process by a tiny
 * PostgREST stand-in that honours offset/limit and a max-rows cap.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createClient } from '@supabase/supabase-js';
import { SupabaseStore } from '../src/storage';
import { PersistenceError } from '../src/utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface FakeRest {
    fetch: typeof fetch;
    urls: URL[];
}

function requestUrl(input: string | URL | Request): URL {
    if (typeof input === 'string') return new URL(input);
    if ('url' in input) return new URL(input.url);
    return new URL(input.href);
}

function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

/**
 * Serves `rows` for price_history, never more than `maxRows` per response.
 */
function fakeRest(rows: number[], maxRows: number, failAt?: number): FakeRest {
    const urls: URL[] = [];
    const handler = async (input: string | URL | Request): Promise<Response> => {
        const url = requestUrl(input);
        urls.push(url);

        const offset = Number(url.searchParams.get('offset') ?? 0);
        if (failAt !== undefined && offset >= failAt) {
            return jsonResponse(500, { message: 'statement timeout', code: '57014', details: null, hint: null });
        }
        const limit = Math.min(Number(url.searchParams.get('limit') ?? maxRows), maxRows);
        const page = rows.slice(offset, offset + limit).map(change => ({ price_change_24h: change }));
        return jsonResponse(200, page);
    };
    return { fetch: handler, urls };
}

function storeOver(rest: FakeRest, pageSize: number): SupabaseStore {
    const client = createClient('http://localhost:54321', 'test-secret', {
        auth: { persistSession: false, autoRefreshToken: false },
        global: { fetch: rest.fetch },
    });
    return new SupabaseStore(client, { pageSize });
}

const SINCE = Date.UTC(2024, 0, 15, 6);

// ═══════════════════════════════════════════════════════════════════════════════
// WINDOW READ
// ═══════════════════════════════════════════════════════════════════════════════

describe('SupabaseStore.readRecentPriceChanges', () => {
    test('pages past the server row cap until a short page', async () => {
        const rows = [1, 2, 3, 4, 5, 6, 7];
        const rest = fakeRest(rows, 3);

        const changes = await storeOver(rest, 3).readRecentPriceChanges(SINCE);

        expect(changes).toEqual(rows);
        expect(rest.urls.map(u => [u.searchParams.get('offset'), u.searchParams.get('limit')])).toEqual([
            ['0', '3'],
            ['3', '3'],
            ['6', '3'],
        ]);
    });

    test('filters on the window start and orders by id', async () => {
        const rest = fakeRest([10], 3);

        await storeOver(rest, 3).readRecentPriceChanges(SINCE);

        const [url] = rest.urls;
        expect(url.pathname).toBe('/rest/v1/price_history');
        expect(url.searchParams.get('select')).toBe('price_change_24h');
        expect(url.searchParams.get('timestamp')).toBe('gte.2024-01-15T06:00:00.000Z');
        expect(url.searchParams.get('order')).toBe('id.asc');
    });

    test('an exact multiple of the page size costs one empty page', async () => {
        const rest = fakeRest([1, 2, 3, 4], 2);

        expect(await storeOver(rest, 2).readRecentPriceChanges(SINCE)).toEqual([1, 2, 3, 4]);
        expect(rest.urls).toHaveLength(3);
    });

    test('a failed page fails the whole read', async () => {
        const rest = fakeRest([1, 2, 3, 4, 5], 2, 2);

        const read = storeOver(rest, 2).readRecentPriceChanges(SINCE);

        await expect(read).rejects.toThrow(PersistenceError);
        await expect(read).rejects.toThrow('readRecentPriceChanges: statement timeout (57014)');
    });
});
