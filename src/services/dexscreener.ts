import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { SCANNER_CONFIG } from '../config/constants';

/**
 * Pair records are returned unvalidated; engine/snapshot.ts is the
 * ingestion boundary.
 */
const PairsResponseSchema = z.object({
    pairs: z.array(z.unknown()).nullable().optional(),
    pair: z.unknown().optional(),
}).passthrough();

export interface MarketDataSource {
    fetchChainPairs(chainId: string): Promise<unknown[]>;
    fetchPair(chainId: string, pairAddress: string): Promise<unknown | null>;
}

export class DexScreenerClient implements MarketDataSource {
    private readonly http: AxiosInstance;

    constructor(http: AxiosInstance) {
        this.http = http;
    }

    static create(baseUrl: string, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS): DexScreenerClient {
        return new DexScreenerClient(
            axios.create({
                baseURL: baseUrl,
                timeout: timeoutMs,
                headers: {
                    'Accept': 'application/json'
                }
            })
        );
    }

    /**
     * All pairs DexScreener lists for a chain. Empty on any failure.
     */
    async fetchChainPairs(chainId: string): Promise<unknown[]> {
        const body = await this.get(`/${encodeURIComponent(chainId)}`, chainId);
        if (!body) return [];

        const pairs = body.pairs ?? [];
        if (pairs.length === 0) {
            logger.warn(`[DEXSCREENER] No pairs returned for ${chainId}`);
        }
        return pairs;
    }

    /**
     * A single pair, or null when it is unknown or the request failed.
     */
    async fetchPair(chainId: string, pairAddress: string): Promise<unknown | null> {
        const body = await this.get(
            `/${encodeURIComponent(chainId)}/${encodeURIComponent(pairAddress)}`,
            `${chainId}/${pairAddress}`
        );
        if (!body) return null;

        // Use first pair (should be the exact match)
        const first = body.pairs?.[0] ?? body.pair;
        if (first === undefined || first === null) {
            logger.warn(`[DEXSCREENER] No data found for pair ${chainId}/${pairAddress}`);
            return null;
        }
        return first;
    }

    private async get(path: string, label: string): Promise<z.infer<typeof PairsResponseSchema> | null> {
        try {
            const response = await this.http.get<unknown>(path);
            const parsed = PairsResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                logger.warn(`[DEXSCREENER] Malformed response for ${label}`);
                return null;
            }
            return parsed.data;
        } catch (error: unknown) {
            if (isAxiosError(error) && error.response?.status === 429) {
                logger.warn(`[DEXSCREENER] Rate limit hit for ${label}`);
            } else {
                logger.error(`[DEXSCREENER] Failed to fetch data for ${label}: ${errorMessage(error)}`);
            }
            return null;
        }
    }
}
