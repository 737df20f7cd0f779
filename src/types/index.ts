// Type Definitions for the DEX Anomaly Scanner

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One poll of one pair. Produced by the ingestion boundary (engine/snapshot.ts)
 * and never mutated afterwards.
 */
export interface PairSnapshot {
    readonly chainId: string;
    readonly pairAddress: string;
    readonly baseSymbol: string;
    readonly quoteSymbol: string;
    /** Creator wallet, "unknown" when the source does not report it */
    readonly creatorWallet: string;
    readonly priceUsd: number;
    readonly volume24h: number;
    readonly liquidityUsd: number;
    /** 24h price change in percent (-60 means -60%) */
    readonly priceChange24h: number;
    /** Pair creation time, epoch ms (0 when unknown) */
    readonly createdAtMs: number;
}

export interface PriceHistoryRecord {
    pairAddress: string;
    priceUsd: number;
    volume24h: number;
    liquidityUsd: number;
    priceChange24h: number;
    /** epoch ms */
    timestamp: number;
}

/**
 * Row of the token_pairs table.
 */
export interface TokenPairRecord {
    pairAddress: string;
    chainId: string;
    baseSymbol: string;
    quoteSymbol: string;
    /** Pair creation time, epoch seconds */
    createdAt: number;
    /** epoch ms */
    firstSeen: number;
    devWallet: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DETECTION OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

export type AnalysisEventType = 'new' | 'rug' | 'pump';

export interface AnalysisEvent {
    pairAddress: string;
    eventType: AnalysisEventType;
    /** epoch ms */
    detectedAt: number;
    details: Record<string, number | string | boolean>;
}

export type TradeAction = 'buy' | 'sell';

export interface TradeSignal {
    pairAddress: string;
    action: TradeAction;
    /** Never negative */
    amount: number;
    reason: string;
}

/**
 * Row of the trades table, written once a trade command was delivered.
 */
export interface TradeRecord {
    pairAddress: string;
    action: TradeAction;
    amount: number;
    price: number;
    fee: number;
    /** epoch ms */
    timestamp: number;
}

export type ClassificationOutcome =
    | 'skipped'
    | 'filtered'
    | 'normal'
    | 'rug'
    | 'pump'
    | 'dip';

export type SkipReason = 'unrated' | 'fake-volume' | 'blacklisted';

/**
 * Persistence effects the classifier asks the engine to apply, in order.
 */
export interface PairWrites {
    upsertPair: TokenPairRecord | null;
    history: PriceHistoryRecord | null;
    events: AnalysisEvent[];
}

export interface Classification {
    pairAddress: string;
    outcome: ClassificationOutcome;
    skipReason?: SkipReason;
    /** Pair was unseen in the pair store when this snapshot arrived */
    isNewPair: boolean;
    writes: PairWrites;
    signal: TradeSignal | null;
    /** Coin entries (symbols / pair addresses) not yet on the blacklist */
    blacklistAdditions: string[];
    /** Sharpe-like ratio of recent returns; informational only */
    sharpeRatio: number;
    /** Threshold adjustment that was in force for this classification */
    adjustment: number;
    /** Set when a store read failed; the engine then drops `writes` */
    persistenceError?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ADAPTIVE STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ThresholdState {
    /** Population stddev of recent 24h price changes, >= 0 */
    volatility: number;
    /** 1 + volatility / 50, >= 1 */
    adjustment: number;
    /** Number of samples behind the last successful update */
    sampleCount: number;
    /** epoch ms of the last successful update, 0 before the first */
    updatedAt: number;
}

export interface EffectiveThresholds {
    rug: number;
    pump: number;
}
