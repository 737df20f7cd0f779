/**
 * External verdicts the classifier consults before looking at the numbers.
 * Implementations live in src/services; tests pass in-process fakes.
 */

export interface ReputationOracle {
    /**
     * Raw rating string for a pair ("good", "warning", ...).
     * May reject on transport or payload errors.
     */
    getRating(pairAddress: string): Promise<string>;
}

export interface FakeVolumeQuery {
    chainId: string;
    pairAddress: string;
    volume24h: number;
    liquidityUsd: number;
}

export interface FakeVolumeVerdict {
    isFakeVolume: boolean;
    reason?: string;
}

export interface FakeVolumeOracle {
    /** May reject on transport or payload errors */
    check(query: FakeVolumeQuery): Promise<FakeVolumeVerdict>;
}
