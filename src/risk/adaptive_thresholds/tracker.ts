/**
 * Adaptive Thresholds - Tracker
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * Holds the current ThresholdState. The engine feeds it once per scan cycle
 * with the price changes recorded over the last window.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    AdaptiveThresholdConfig,
    EffectiveThresholds,
    ThresholdState,
} from './types';
import { COLD_START_STATE, DEFAULT_CONFIG } from './config';
import { calculateStdDev } from '../../utils/math';

/**
 * Next state for a batch of samples. Returns `previous` unchanged when there
 * are not enough samples. Samples must already be finite numbers.
 */
export function computeThresholdState(
    previous: ThresholdState,
    samples: readonly number[],
    now: number = Date.now(),
    config: AdaptiveThresholdConfig = DEFAULT_CONFIG
): ThresholdState {
    if (samples.length < config.minSamples) {
        return previous;
    }
    
    const volatility = calculateStdDev(samples);
    
    return {
        volatility,
        adjustment: 1 + volatility / config.volatilityDivisor,
        sampleCount: samples.length,
        updatedAt: now,
    };
}

/**
 * Base thresholds scaled by the adjustment; the rug threshold keeps its sign.
 */
export function effectiveThresholds(
    state: ThresholdState,
    config: AdaptiveThresholdConfig = DEFAULT_CONFIG
): EffectiveThresholds {
    return {
        rug: config.baseRugThreshold * state.adjustment,
        pump: config.basePumpThreshold * state.adjustment,
    };
}

export class AdaptiveThresholdTracker {
    private state: ThresholdState;
    private readonly config: AdaptiveThresholdConfig;

    constructor(
        config: AdaptiveThresholdConfig = DEFAULT_CONFIG,
        initial: ThresholdState = COLD_START_STATE
    ) {
        this.config = config;
        this.state = { ...initial };
    }

    /**
     * @returns true when the state was recomputed
     */
    update(recentPriceChanges: readonly number[], now: number = Date.now()): boolean {
        const next = computeThresholdState(this.state, recentPriceChanges, now, this.config);
        if (next === this.state) {
            return false;
        }
        this.state = next;
        return true;
    }

    getState(): ThresholdState {
        return { ...this.state };
    }

    get adjustment(): number {
        return this.state.adjustment;
    }

    get volatility(): number {
        return this.state.volatility;
    }

    get windowMs(): number {
        return this.config.windowMs;
    }

    getEffectiveThresholds(): EffectiveThresholds {
        return effectiveThresholds(this.state, this.config);
    }
}
