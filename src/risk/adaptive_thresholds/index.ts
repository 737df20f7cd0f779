/**
 * Adaptive Thresholds Module
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Market-volatility-scaled rug/pump thresholds.
 * 
 * INTEGRATION:
 * Once per scan cycle:
 *   tracker.update(priceChangesOfLastSixHours);
 * Per pair:
 *   const { rug, pump } = effectiveThresholds(tracker.getState());
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    AdaptiveThresholdConfig,
    ThresholdState,
    EffectiveThresholds,
} from './types';

export {
    DEFAULT_CONFIG,
    COLD_START_STATE,
    createConfig,
} from './config';

export {
    AdaptiveThresholdTracker,
    computeThresholdState,
    effectiveThresholds,
} from './tracker';
