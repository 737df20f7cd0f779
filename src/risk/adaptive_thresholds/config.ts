/**
 * Adaptive Thresholds - Configuration
 */

import { AdaptiveThresholdConfig, ThresholdState } from './types';
import { SCANNER_CONFIG } from '../../config/constants';

export const DEFAULT_CONFIG: AdaptiveThresholdConfig = {
    volatilityDivisor: SCANNER_CONFIG.VOLATILITY_DIVISOR,
    minSamples: SCANNER_CONFIG.MIN_VOLATILITY_SAMPLES,
    windowMs: SCANNER_CONFIG.VOLATILITY_WINDOW_MS,
    baseRugThreshold: SCANNER_CONFIG.RUG_THRESHOLD,
    basePumpThreshold: SCANNER_CONFIG.PUMP_THRESHOLD,
};

export const COLD_START_STATE: ThresholdState = {
    volatility: 0,
    adjustment: 1.0,
    sampleCount: 0,
    updatedAt: 0,
};

export function createConfig(overrides: Partial<AdaptiveThresholdConfig>): AdaptiveThresholdConfig {
    return {
        ...DEFAULT_CONFIG,
        ...overrides,
    };
}
