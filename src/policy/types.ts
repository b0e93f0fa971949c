/**
 * Policy Module - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Pure calculators the ledgers and the orchestrator consult.
 * Interest-rate curve, required collateral, health tiers, available liquidity.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PolicyParameters } from '../config/parameters';

/**
 * Collateral health tier. Numeric values are part of the external contract.
 */
export enum HealthTier {
    Liquidatable = 1,
    Warning = 2,
    Healthy = 3,
}

export interface LiquiditySnapshot {
    totalCommitted: bigint;
    pendingAdds: bigint;
    pendingReductions: bigint;
    /** Outstanding synthetic value plus deposits already queued this cycle */
    utilized: bigint;
}

export interface InterestSplit {
    lpShare: bigint;
    protocolFee: bigint;
}

/**
 * Pluggable pool policy. Every method is pure.
 */
export interface PoolStrategy {
    readonly id: string;
    readonly parameters: Readonly<PolicyParameters>;

    interestRate(utilization: bigint): bigint;
    utilization(outstandingValue: bigint, totalCommitted: bigint): bigint;
    requiredCollateral(exposureValue: bigint, ratio: bigint): bigint;
    collateralRatio(collateral: bigint, exposureValue: bigint): bigint;
    health(currentRatio: bigint, healthyRatio: bigint, liquidationRatio: bigint): HealthTier;
    userHealth(netCollateral: bigint, exposureValue: bigint): HealthTier;
    lpHealth(collateral: bigint, exposureValue: bigint): HealthTier;
    availableLiquidity(snapshot: LiquiditySnapshot): bigint;
    lpLiquidationReward(targetCollateral: bigint, amount: bigint, targetCommitted: bigint): bigint;
    splitInterest(amount: bigint): InterestSplit;
}
