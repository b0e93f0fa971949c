/**
 * Oracle Module - Type Definitions
 */

/**
 * Daily OHLC quote, 18-decimal fixed point, timestamp in seconds.
 */
export interface OhlcQuote {
    open: bigint;
    high: bigint;
    low: bigint;
    close: bigint;
    timestamp: number;
}

/**
 * Quote as it arrives from a market data feed. Decimal strings and numbers
 * are converted exactly; bigints are taken as already scaled by 1e18.
 */
export interface OhlcInput {
    open: string | number | bigint;
    high: string | number | bigint;
    low: string | number | bigint;
    close: string | number | bigint;
    timestamp?: number;
}

/**
 * Price source consumed by the cycle orchestrator.
 */
export interface AssetOracle {
    readonly symbol: string;

    currentPrice(): bigint;
    isMarketOpen(): boolean;
    lastUpdateTimestamp(): number;
    ohlc(): OhlcQuote | null;

    splitDetected(): boolean;
    preSplitPrice(): bigint;
    /** True when a detected split matches ratioNum:ratioDen */
    verifySplit(ratioNum: bigint, ratioDen: bigint): boolean;
    /** Reset split detection once a deviation has been resolved */
    clearSplit(): void;
}

export interface AssetOracleConfig {
    /** A close moving more than this from the previous close flags a split */
    splitDetectionBps: bigint;
    /** Allowed error when matching a split ratio against the pre-split price */
    splitToleranceBps: bigint;
    /** Minimum seconds between accepted updates (0 disables) */
    minUpdateInterval: number;
}
