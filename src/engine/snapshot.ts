/**
 * Ingestion boundary: raw market-data pair records → strict PairSnapshot.
 *
 * Identity fields (chain, pair address, token symbols) are required. Numeric
 * market fields may arrive as numbers or numeric strings and default to 0 when
 * absent; a present but non-numeric value rejects the record.
 */

import { z } from 'zod';
import { PairSnapshot } from '../types';

const numeric = z.coerce.number().finite().default(0);

const TokenSchema = z.object({
    symbol: z.string().min(1),
});

export const RawPairSchema = z.object({
    chainId: z.string().min(1),
    pairAddress: z.string().min(1),
    baseToken: TokenSchema,
    quoteToken: TokenSchema,
    priceUsd: numeric,
    volume: z.object({ h24: numeric }).default({}),
    liquidity: z.object({ usd: numeric }).default({}),
    priceChange: z.object({ h24: numeric }).default({}),
    pairCreatedAt: numeric,
    pairCreatedBy: z.string().min(1).default('unknown'),
});

export type ParsedSnapshot =
    | { ok: true; snapshot: PairSnapshot }
    | { ok: false; error: string };

export function parsePairSnapshot(raw: unknown): ParsedSnapshot {
    const result = RawPairSchema.safeParse(raw);
    if (!result.success) {
        const error = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        return { ok: false, error };
    }

    const pair = result.data;
    return {
        ok: true,
        snapshot: {
            chainId: pair.chainId,
            pairAddress: pair.pairAddress,
            baseSymbol: pair.baseToken.symbol,
            quoteSymbol: pair.quoteToken.symbol,
            creatorWallet: pair.pairCreatedBy,
            priceUsd: pair.priceUsd,
            volume24h: pair.volume.h24,
            liquidityUsd: pair.liquidity.usd,
            priceChange24h: pair.priceChange.h24,
            createdAtMs: pair.pairCreatedAt,
        },
    };
}

/**
 * Best-effort pair address of a record that failed validation, for logs.
 */
export function describeRawPair(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'pairAddress' in raw) {
        const address = raw.pairAddress;
        if (typeof address === 'string' && address.length > 0) {
            return address;
        }
    }
    return '<unknown pair>';
}
