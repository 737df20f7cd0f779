/**
 * Liquidity-bounded position sizing.
 *
 * The configured fraction of the portfolio is the target size, but a pool
 * never receives more than 1% of its own liquidity. Pools at or under the
 * minimum liquidity floor, or with an unusable liquidity figure, get 0.
 */

import { DEFAULT_RISK } from '../config/constants';

export interface RiskSizerConfig {
    positionFraction: number;
    portfolioValue: number;
    maxLiquidityShare: number;
    minLiquidityUsd: number;
}

export const DEFAULT_SIZER_CONFIG: RiskSizerConfig = {
    positionFraction: DEFAULT_RISK.positionFraction,
    portfolioValue: DEFAULT_RISK.portfolioValue,
    maxLiquidityShare: DEFAULT_RISK.maxLiquidityShare,
    minLiquidityUsd: DEFAULT_RISK.minLiquidityUsd,
};

export class RiskSizer {
    private readonly config: RiskSizerConfig;

    constructor(overrides: Partial<RiskSizerConfig> = {}) {
        this.config = { ...DEFAULT_SIZER_CONFIG, ...overrides };
    }

    size(liquidityUsd: number): number {
        if (!Number.isFinite(liquidityUsd) || liquidityUsd <= this.config.minLiquidityUsd) {
            return 0;
        }

        const target = this.config.positionFraction * this.config.portfolioValue;
        const liquidityCap = liquidityUsd * this.config.maxLiquidityShare;

        return Math.max(0, Math.min(target, liquidityCap));
    }
}
