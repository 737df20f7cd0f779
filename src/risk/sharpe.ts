/**
 * Risk-adjusted confidence from a pair's own price history.
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * ratio = (mean(returns) - riskFreeRate) / (stddev(returns) + ε)
 * 
 * Simple returns of consecutive history prices, oldest first, limited to the
 * most recent lookback. Below the minimum return count the ratio is 0.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PriceHistoryRecord } from '../types';
import { SCANNER_CONFIG } from '../config/constants';
import { calculateMean, calculateStdDev } from '../utils/math';

export interface SharpeConfig {
    lookbackReturns: number;
    minReturns: number;
    riskFreeRate: number;
    epsilon: number;
}

export const DEFAULT_SHARPE_CONFIG: SharpeConfig = {
    lookbackReturns: SCANNER_CONFIG.SHARPE_LOOKBACK_RETURNS,
    minReturns: SCANNER_CONFIG.SHARPE_MIN_RETURNS,
    riskFreeRate: 0,
    epsilon: SCANNER_CONFIG.SHARPE_EPSILON,
};

/**
 * Returns of `prices[i]` over `prices[i - 1]`. Steps whose previous price is
 * zero or not finite are skipped.
 */
export function computeReturns(prices: readonly number[]): number[] {
    const returns: number[] = [];
    for (let i = 1; i < prices.length; i++) {
        const previous = prices[i - 1];
        const current = prices[i];
        if (!Number.isFinite(previous) || !Number.isFinite(current) || previous === 0) {
            continue;
        }
        returns.push((current - previous) / previous);
    }
    return returns;
}

export function computeSharpeRatio(
    returns: readonly number[],
    config: SharpeConfig = DEFAULT_SHARPE_CONFIG
): number {
    const recent = returns.slice(-config.lookbackReturns);
    if (recent.length < config.minReturns) {
        return 0;
    }
    
    const mean = calculateMean(recent);
    const stdDev = calculateStdDev(recent);
    
    return (mean - config.riskFreeRate) / (stdDev + config.epsilon);
}

/**
 * Sharpe-like ratio of a pair's recorded history (any order).
 */
export function historySharpeRatio(
    history: readonly PriceHistoryRecord[],
    config: SharpeConfig = DEFAULT_SHARPE_CONFIG
): number {
    const prices = [...history]
        .sort((a, b) => a.timestamp - b.timestamp)
        .map(record => record.priceUsd);
    return computeSharpeRatio(computeReturns(prices), config);
}
