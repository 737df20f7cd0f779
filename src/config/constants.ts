// Configuration Constants for the DEX Anomaly Scanner

export const SCANNER_CONFIG = {
    // Timing
    SCAN_INTERVAL_MS: 5 * 60 * 1000, // 5 minutes between full scans
    PAIR_DELAY_MS: 200, // throttle between pairs
    EXTERNAL_TIMEOUT_MS: 5000, // every outbound call
    DISPATCH_INTERVAL_MS: 1000, // outbox drain period
    DISPATCH_MAX_ATTEMPTS: 3,

    // Default chains (DexScreener chain ids)
    CHAINS: ['ethereum', 'bsc', 'polygon'] as const,

    // ═══════════════════════════════════════════════════════════════════════════
    // DETECTION THRESHOLDS (scaled by the adaptive adjustment)
    // ═══════════════════════════════════════════════════════════════════════════
    RUG_THRESHOLD: -50,            // % price change
    PUMP_THRESHOLD: 100,           // % price change
    RUG_MAX_LIQUIDITY_USD: 1000,   // rug requires liquidity below this
    PUMP_MIN_VOLUME_USD: 100000,   // pump requires volume above this
    DIP_THRESHOLD: -10,            // % price change
    DIP_SELL_AMOUNT: 0.5,          // fixed, not risk-sized
    NEW_PAIR_HOURS: 24,

    // ═══════════════════════════════════════════════════════════════════════════
    // ADAPTIVE THRESHOLDS
    // ═══════════════════════════════════════════════════════════════════════════
    VOLATILITY_WINDOW_MS: 6 * 60 * 60 * 1000, // 6 hours
    VOLATILITY_DIVISOR: 50,
    MIN_VOLATILITY_SAMPLES: 2,

    // ═══════════════════════════════════════════════════════════════════════════
    // RISK-ADJUSTED CONFIDENCE
    // ═══════════════════════════════════════════════════════════════════════════
    SHARPE_LOOKBACK_RETURNS: 50,
    SHARPE_MIN_RETURNS: 5,
    SHARPE_EPSILON: 1e-6,
} as const;

export const DEFAULT_FILTERS = {
    minLiquidity: 1000,
    minVolume24h: 10000,
    minPriceChange: -1000,
} as const;

export const DEFAULT_RISK = {
    positionFraction: 0.10,
    portfolioValue: 10000,
    maxLiquidityShare: 0.01, // never more than 1% of pool liquidity
    minLiquidityUsd: 100,
    riskFreeRate: 0,
} as const;
