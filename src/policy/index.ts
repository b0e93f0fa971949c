/**
 * Policy Module
 *
 * Interest-rate curve, collateral requirements, health tiers and
 * available-liquidity math shared by both ledgers and the orchestrator.
 */

export type {
    LiquiditySnapshot,
    InterestSplit,
    PoolStrategy,
} from './types';

export { HealthTier } from './types';

export { DefaultPoolStrategy } from './defaultStrategy';
