/**
 * Pocket Universe-style fake volume check:
 * POST { chain, pair_address, volume_24h, liquidity_usd }
 * answering { "is_fake_volume": boolean, "reason"?: string }.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FakeVolumeOracle, FakeVolumeQuery, FakeVolumeVerdict } from '../engine/oracles';
import { SCANNER_CONFIG } from '../config/constants';
import { OracleError } from '../utils/errors';
import logger from '../utils/logger';

const VerdictSchema = z.object({
    is_fake_volume: z.boolean().default(false),
    reason: z.string().optional(),
}).passthrough();

export class PocketUniverseClient implements FakeVolumeOracle {
    private readonly http: AxiosInstance;
    private readonly timeoutMs: number;

    constructor(http: AxiosInstance, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS) {
        this.http = http;
        this.timeoutMs = timeoutMs;
    }

    static create(url: string, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS): PocketUniverseClient {
        return new PocketUniverseClient(
            axios.create({
                baseURL: url,
                timeout: timeoutMs,
                headers: { 'Accept': 'application/json' },
            }),
            timeoutMs
        );
    }

    async check(query: FakeVolumeQuery): Promise<FakeVolumeVerdict> {
        const response = await this.http.post<unknown>('', {
            chain: query.chainId,
            pair_address: query.pairAddress,
            volume_24h: query.volume24h,
            liquidity_usd: query.liquidityUsd,
        }, {
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        const parsed = VerdictSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new OracleError('pocket-universe', `unexpected payload for ${query.pairAddress}`);
        }

        if (parsed.data.is_fake_volume) {
            logger.info(`[FAKE-VOLUME] Fake volume detected for ${query.pairAddress}: ${parsed.data.reason ?? 'No reason'}`);
        }

        return {
            isFakeVolume: parsed.data.is_fake_volume,
            reason: parsed.data.reason,
        };
    }
}
