// Fixed-point constants for the pool engine

/** Scale of prices, the interest index and the split multiplier (1e18) */
export const PRECISION = 10n ** 18n;

/** Basis points denominator */
export const BPS = 10_000n;

export const SECONDS_PER_YEAR = 31_536_000n;

/** Decimals of the synthetic asset token */
export const ASSET_DECIMALS = 18;

export const POOL_LIMITS = {
    /** Largest share of a position one liquidation may take (30%) */
    MAX_LIQUIDATION_BPS: 3_000n,

    /** Upper bound for any configured ratio (1000%) */
    MAX_RATIO_BPS: 100_000n,

    /** Upper bound for any annual interest rate (100%) */
    MAX_RATE_BPS: 10_000n,

    MAX_RESERVE_DECIMALS: 18,
} as const;

