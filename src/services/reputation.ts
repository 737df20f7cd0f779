/**
 * RugCheck-style reputation lookup: GET {RUGCHECK_URL}?token_address=<pair>
 * answering { "rating": "good" | ... }.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ReputationOracle } from '../engine/oracles';
import { SCANNER_CONFIG } from '../config/constants';
import { OracleError } from '../utils/errors';
import logger from '../utils/logger';

const RatingResponseSchema = z.object({
    rating: z.string().default(''),
}).passthrough();

export class RugCheckClient implements ReputationOracle {
    private readonly http: AxiosInstance;
    private readonly timeoutMs: number;

    constructor(http: AxiosInstance, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS) {
        this.http = http;
        this.timeoutMs = timeoutMs;
    }

    static create(baseUrl: string, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS): RugCheckClient {
        return new RugCheckClient(
            axios.create({
                baseURL: baseUrl,
                timeout: timeoutMs,
                headers: { 'Accept': 'application/json' },
            }),
            timeoutMs
        );
    }

    async getRating(pairAddress: string): Promise<string> {
        const response = await this.http.get<unknown>('', {
            params: { token_address: pairAddress },
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        const parsed = RatingResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new OracleError('rugcheck', `unexpected payload for ${pairAddress}`);
        }

        logger.info(`[RUGCHECK] Rating for ${pairAddress}: ${parsed.data.rating.toLowerCase()}`);
        return parsed.data.rating;
    }
}
