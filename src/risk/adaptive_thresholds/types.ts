/**
 * Adaptive Thresholds - Type Definitions
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Widen the rug/pump trigger levels when the whole market is moving.
 * 
 * A calm market keeps the base thresholds (adjustment = 1). A market whose
 * recent 24h price changes are widely dispersed scales both thresholds out,
 * so a +100% move during a frenzy is no longer reported as a pump.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type { ThresholdState, EffectiveThresholds } from '../../types';

export interface AdaptiveThresholdConfig {
    /** adjustment = 1 + volatility / volatilityDivisor */
    volatilityDivisor: number;
    
    /** Fewer samples than this leave the state untouched */
    minSamples: number;
    
    /** How far back the price-change samples reach (ms) */
    windowMs: number;
    
    /** Base rug threshold in % (negative) */
    baseRugThreshold: number;
    
    /** Base pump threshold in % */
    basePumpThreshold: number;
}
