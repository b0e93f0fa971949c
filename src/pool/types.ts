/**
 * Pool Module - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Units:
 *   reserve amounts       → reserve token base units (reserveDecimals)
 *   synthetic positions   → token SHARES, so a split rescales them for free
 *   prices, index         → PRECISION (1e18) fixed point
 *   timestamps            → seconds from the pool Clock
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export enum PoolState {
    ACTIVE = 'ACTIVE',
    REBALANCING_OFFCHAIN = 'REBALANCING_OFFCHAIN',
    REBALANCING_ONCHAIN = 'REBALANCING_ONCHAIN',
    HALTED = 'HALTED',
}

export type CycleStatus = 'OPEN' | 'SETTLING' | 'SETTLED';

/**
 * DETECTED is never stored: a rejected initiation rolls back, so it is
 * reported live by the orchestrator while the oracle price still deviates.
 */
export type DeviationStatus = 'NONE' | 'DETECTED' | 'ACCEPTED' | 'SPLIT';

export interface CycleRecord {
    index: number;
    state: CycleStatus;

    startedAt: number;
    offchainStartedAt: number | null;
    onchainStartedAt: number | null;
    settledAt: number | null;

    /** 0 until fixed by initiateOnchainRebalance */
    settlementPrice: bigint;
    /** Synthetic split multiplier at the moment the price was fixed */
    splitMultiplier: bigint;

    totalDeposits: bigint;
    totalRedemptionShares: bigint;
    redemptionPrincipal: bigint;

    /** 0 until snapshotted by initiateOffchainRebalance */
    interestIndex: bigint;
    utilization: bigint;
    interestRate: bigint;
    interestAccrued: bigint;

    /** Signed: positive pays LPs, negative is owed by LPs */
    netFlow: bigint;
    activeLps: string[];
    totalCommitted: bigint;
    settledLpCount: number;

    deviation: Exclude<DeviationStatus, 'DETECTED'>;
    splitRatio: { num: bigint; den: bigint } | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// USERS
// ═══════════════════════════════════════════════════════════════════════════════

export enum UserRequestKind {
    NONE = 'NONE',
    DEPOSIT = 'DEPOSIT',
    REDEEM = 'REDEEM',
    LIQUIDATE = 'LIQUIDATE',
}

export interface UserRequest {
    id: string;
    kind: UserRequestKind;
    /** Reserve for DEPOSIT, synthetic shares for REDEEM / LIQUIDATE */
    amount: bigint;
    collateral: bigint;
    /** Principal leaving the position with a REDEEM / LIQUIDATE */
    principal: bigint;
    target: string | null;
    cycle: number;
}

export interface UserPosition {
    assetShares: bigint;
    principal: bigint;
    collateral: bigint;
    /** Principal-weighted interest index of the position */
    interestIndex: bigint;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIQUIDITY PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

export enum LpRequestKind {
    NONE = 'NONE',
    ADD = 'ADD',
    REDUCE = 'REDUCE',
    LIQUIDATE = 'LIQUIDATE',
}

export interface LpRequest {
    id: string;
    kind: LpRequestKind;
    /** Liquidity in reserve units */
    amount: bigint;
    /** Liquidation escrow */
    collateral: bigint;
    target: string | null;
    cycle: number;
}

export interface LpPosition {
    committedLiquidity: bigint;
    collateral: bigint;
    float: bigint;
    accruedInterest: bigint;
    lastRebalancedCycle: number | null;
    registeredAt: number;
}

/** One pending liquidation per target; the liquidator's request holds the escrow */
export interface LiquidationClaim {
    liquidator: string;
    /** Synthetic amount for users, liquidity for LPs; compared on replacement */
    amount: bigint;
    cycle: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HALT
// ═══════════════════════════════════════════════════════════════════════════════

export interface HaltSnapshot {
    haltedAt: number;
    cycle: number;
    reason: string;
    /** Price the exit reserve was valued at */
    price: bigint;
    /** Settled synthetic supply (shares) entitled to the exit reserve */
    supplyShares: bigint;
    exitReserve: bigint;
    exitReservePaid: bigint;
}

export interface LpObligation {
    lp: string;
    /** Signed reserve flow: positive is paid to the LP */
    flow: bigint;
    isContribution: boolean;
    amount: bigint;
}
