/**
 * Shared fixtures: snapshot/raw-pair builders, in-process oracles and notifier,
 * and an axios instance answered by a local adapter (no network).
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { PairSnapshot } from '../src/types';
import { FakeVolumeOracle, FakeVolumeQuery, FakeVolumeVerdict, ReputationOracle } from '../src/engine/oracles';
import { Notifier } from '../src/notifiers/telegram';

export const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);
export const HOUR_MS = 60 * 60 * 1000;

export function makeSnapshot(partial: Partial<PairSnapshot> = {}): PairSnapshot {
    return {
        chainId: 'ethereum',
        pairAddress: '0xpair1',
        baseSymbol: 'TKN',
        quoteSymbol: 'WETH',
        creatorWallet: '0xdev1',
        priceUsd: 2,
        volume24h: 50000,
        liquidityUsd: 5000,
        priceChange24h: 5,
        createdAtMs: NOW - 48 * HOUR_MS,
        ...partial,
    };
}

export function makeRawPair(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        chainId: 'ethereum',
        pairAddress: '0xpair1',
        baseToken: { symbol: 'TKN' },
        quoteToken: { symbol: 'WETH' },
        priceUsd: '2.5',
        volume: { h24: 50000 },
        liquidity: { usd: 5000 },
        priceChange: { h24: 5 },
        pairCreatedAt: NOW - 48 * HOUR_MS,
        pairCreatedBy: '0xdev1',
        ...overrides,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORACLES
// ═══════════════════════════════════════════════════════════════════════════════

export class FakeReputation implements ReputationOracle {
    calls: string[] = [];
    ratings = new Map<string, string>();
    error: Error | null = null;
    defaultRating = 'good';

    async getRating(pairAddress: string): Promise<string> {
        this.calls.push(pairAddress);
        if (this.error) throw this.error;
        return this.ratings.get(pairAddress) ?? this.defaultRating;
    }
}

export class FakeVolumeCheck implements FakeVolumeOracle {
    calls: FakeVolumeQuery[] = [];
    fake = new Set<string>();
    error: Error | null = null;

    async check(query: FakeVolumeQuery): Promise<FakeVolumeVerdict> {
        this.calls.push(query);
        if (this.error) throw this.error;
        return this.fake.has(query.pairAddress)
            ? { isFakeVolume: true, reason: 'wash trading' }
            : { isFakeVolume: false };
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFIER
// ═══════════════════════════════════════════════════════════════════════════════

export class RecordingNotifier implements Notifier {
    sent: string[] = [];
    /** Number of upcoming send() calls that reject */
    failNext = 0;
    /** Reject every send whose text starts with this prefix */
    failPrefix: string | null = null;

    async send(text: string): Promise<void> {
        if (this.failNext > 0) {
            this.failNext--;
            throw new Error('chat unavailable');
        }
        if (this.failPrefix !== null && text.startsWith(this.failPrefix)) {
            throw new Error('chat unavailable');
        }
        this.sent.push(text);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════════════

export interface StubReply {
    status?: number;
    data?: unknown;
    /** Reject like a transport failure */
    networkError?: boolean;
}

export interface HttpStub {
    http: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
}

/**
 * axios instance whose adapter answers every request with `reply(config)`.
 * Non-2xx replies reject with an AxiosError unless the request overrides
 * validateStatus.
 */
export function stubHttp(reply: (config: InternalAxiosRequestConfig) => StubReply): HttpStub {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
        baseURL: 'http://stub.local/api',
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            requests.push(config);
            const answer = reply(config);
            if (answer.networkError) {
                throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
            }

            const response: AxiosResponse = {
                data: answer.data,
                status: answer.status ?? 200,
                statusText: '',
                headers: {},
                config,
            };
            const validate = config.validateStatus ?? ((status: number) => status >= 200 && status < 300);
            if (!validate(response.status)) {
                throw new AxiosError(
                    `Request failed with status code ${response.status}`,
                    AxiosError.ERR_BAD_RESPONSE,
                    config,
                    null,
                    response
                );
            }
            return response;
        },
    });
    return { http, requests };
}
