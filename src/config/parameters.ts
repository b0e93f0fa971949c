import dotenv from 'dotenv';
import { BPS, POOL_LIMITS } from './constants';
import { ValidationError } from '../core/errors';

/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * POOL PARAMETERS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Rates and ratios are basis points (bigint). Durations are seconds (number).
 * Admin tooling changes these through createPoolConfig(); every path runs
 * validatePoolConfig() so an out-of-range value never reaches a pool.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export interface PolicyParameters {
    /** Annual rate below tier1 utilization */
    baseRate: bigint;
    /** Annual rate at tier2 utilization */
    rate1: bigint;
    /** Annual rate at 100% utilization and above */
    maxRate: bigint;
    /** First utilization breakpoint */
    tier1: bigint;
    /** Second utilization breakpoint */
    tier2: bigint;

    userHealthyRatio: bigint;
    userLiquidationRatio: bigint;
    lpHealthyRatio: bigint;
    lpLiquidationRatio: bigint;

    /** Share of the liquidated slice of LP collateral paid to the liquidator */
    lpLiquidationRewardBps: bigint;
    /** Protocol cut of interest before it is credited to LPs */
    protocolFeeBps: bigint;
}

export interface CycleParameters {
    /** Minimum ACTIVE time before the offchain rebalance may start */
    cycleLength: number;
    /** Minimum offchain phase before the onchain rebalance may start */
    rebalanceLength: number;
    /** Time after onchain start before an unsettled LP may be forced */
    haltThreshold: number;
    /** One tolerance band for every settlement price comparison */
    priceDeviationToleranceBps: bigint;
    /** Oldest oracle update accepted for settlement */
    oracleMaxAge: number;
}

export interface PoolConfig {
    reserveDecimals: number;
    cycle: CycleParameters;
    policy: PolicyParameters;
}

export interface PoolConfigOverrides {
    reserveDecimals?: number;
    cycle?: Partial<CycleParameters>;
    policy?: Partial<PolicyParameters>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_POLICY_PARAMETERS: PolicyParameters = {
    baseRate: 600n,             // 6%
    rate1: 1_200n,              // 12%
    maxRate: 3_600n,            // 36%
    tier1: 6_500n,              // 65% utilization
    tier2: 8_500n,              // 85% utilization

    userHealthyRatio: 2_000n,   // 20%
    userLiquidationRatio: 1_250n,
    lpHealthyRatio: 3_000n,     // 30%
    lpLiquidationRatio: 2_000n,

    lpLiquidationRewardBps: 500n,
    protocolFeeBps: 1_000n,
};

export const DEFAULT_CYCLE_PARAMETERS: CycleParameters = {
    cycleLength: 22 * 60 * 60,
    rebalanceLength: 2 * 60 * 60,
    haltThreshold: 24 * 60 * 60,
    priceDeviationToleranceBps: 1_500n,
    oracleMaxAge: 60 * 60,
};

export const DEFAULT_POOL_CONFIG: PoolConfig = {
    reserveDecimals: 6,
    cycle: DEFAULT_CYCLE_PARAMETERS,
    policy: DEFAULT_POLICY_PARAMETERS,
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a validated config with overrides
 */
export function createPoolConfig(overrides: PoolConfigOverrides = {}): PoolConfig {
    const config: PoolConfig = {
        reserveDecimals: overrides.reserveDecimals ?? DEFAULT_POOL_CONFIG.reserveDecimals,
        cycle: {
            ...DEFAULT_POOL_CONFIG.cycle,
            ...(overrides.cycle ?? {}),
        },
        policy: {
            ...DEFAULT_POOL_CONFIG.policy,
            ...(overrides.policy ?? {}),
        },
    };
    validatePoolConfig(config);
    return config;
}

function invalid(field: string, reason: string): never {
    throw new ValidationError('InvalidParameter', `${field} ${reason}`, { field });
}

function requireBps(field: string, value: bigint, max: bigint): void {
    if (value < 0n || value > max) {
        invalid(field, `must be within [0, ${max}] bps`);
    }
}

function requireDuration(field: string, value: number): void {
    if (!Number.isSafeInteger(value) || value <= 0) {
        invalid(field, 'must be a positive whole number of seconds');
    }
}

export function validatePolicyParameters(p: PolicyParameters): void {
    requireBps('baseRate', p.baseRate, POOL_LIMITS.MAX_RATE_BPS);
    requireBps('rate1', p.rate1, POOL_LIMITS.MAX_RATE_BPS);
    requireBps('maxRate', p.maxRate, POOL_LIMITS.MAX_RATE_BPS);
    if (p.baseRate > p.rate1 || p.rate1 > p.maxRate) {
        invalid('rate1', 'must satisfy baseRate <= rate1 <= maxRate');
    }

    requireBps('tier1', p.tier1, BPS);
    requireBps('tier2', p.tier2, BPS);
    if (p.tier2 <= p.tier1) {
        invalid('tier2', 'must be greater than tier1');
    }
    if (p.tier2 >= BPS) {
        invalid('tier2', 'must be below 100% utilization');
    }

    requireBps('userHealthyRatio', p.userHealthyRatio, POOL_LIMITS.MAX_RATIO_BPS);
    requireBps('userLiquidationRatio', p.userLiquidationRatio, POOL_LIMITS.MAX_RATIO_BPS);
    if (p.userLiquidationRatio >= p.userHealthyRatio) {
        invalid('userLiquidationRatio', 'must be below userHealthyRatio');
    }

    requireBps('lpHealthyRatio', p.lpHealthyRatio, POOL_LIMITS.MAX_RATIO_BPS);
    requireBps('lpLiquidationRatio', p.lpLiquidationRatio, POOL_LIMITS.MAX_RATIO_BPS);
    if (p.lpLiquidationRatio >= p.lpHealthyRatio) {
        invalid('lpLiquidationRatio', 'must be below lpHealthyRatio');
    }

    requireBps('lpLiquidationRewardBps', p.lpLiquidationRewardBps, BPS);
    requireBps('protocolFeeBps', p.protocolFeeBps, BPS);
}

export function validateCycleParameters(c: CycleParameters): void {
    requireDuration('cycleLength', c.cycleLength);
    requireDuration('rebalanceLength', c.rebalanceLength);
    requireDuration('haltThreshold', c.haltThreshold);
    requireDuration('oracleMaxAge', c.oracleMaxAge);
    requireBps('priceDeviationToleranceBps', c.priceDeviationToleranceBps, BPS);
}

export function validatePoolConfig(config: PoolConfig): void {
    if (!Number.isInteger(config.reserveDecimals)
        || config.reserveDecimals < 0
        || config.reserveDecimals > POOL_LIMITS.MAX_RESERVE_DECIMALS) {
        invalid('reserveDecimals', `must be an integer within [0, ${POOL_LIMITS.MAX_RESERVE_DECIMALS}]`);
    }
    validateCycleParameters(config.cycle);
    validatePolicyParameters(config.policy);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
        invalid(key, `is not a whole number: ${raw}`);
    }
    return value;
}

function readBps(env: Env, key: string): bigint | undefined {
    const raw = env[key];
    if (raw === undefined || raw === '') return undefined;
    if (!/^\d+$/.test(raw)) {
        invalid(key, `is not a whole number of bps: ${raw}`);
    }
    return BigInt(raw);
}

/**
 * Build a pool config from environment variables (loaded through dotenv).
 * Unset variables keep their defaults.
 */
export function loadPoolConfigFromEnv(env: Env = process.env, loadDotenv: boolean = true): PoolConfig {
    if (loadDotenv) {
        dotenv.config();
    }

    const c = DEFAULT_CYCLE_PARAMETERS;
    const p = DEFAULT_POLICY_PARAMETERS;

    return createPoolConfig({
        reserveDecimals: readInteger(env, 'RESERVE_DECIMALS') ?? DEFAULT_POOL_CONFIG.reserveDecimals,
        cycle: {
            cycleLength: readInteger(env, 'CYCLE_LENGTH_SECONDS') ?? c.cycleLength,
            rebalanceLength: readInteger(env, 'REBALANCE_LENGTH_SECONDS') ?? c.rebalanceLength,
            haltThreshold: readInteger(env, 'HALT_THRESHOLD_SECONDS') ?? c.haltThreshold,
            oracleMaxAge: readInteger(env, 'ORACLE_MAX_AGE_SECONDS') ?? c.oracleMaxAge,
            priceDeviationToleranceBps: readBps(env, 'PRICE_DEVIATION_TOLERANCE_BPS') ?? c.priceDeviationToleranceBps,
        },
        policy: {
            baseRate: readBps(env, 'BASE_RATE_BPS') ?? p.baseRate,
            rate1: readBps(env, 'RATE1_BPS') ?? p.rate1,
            maxRate: readBps(env, 'MAX_RATE_BPS') ?? p.maxRate,
            tier1: readBps(env, 'UTILIZATION_TIER1_BPS') ?? p.tier1,
            tier2: readBps(env, 'UTILIZATION_TIER2_BPS') ?? p.tier2,
            userHealthyRatio: readBps(env, 'USER_HEALTHY_RATIO_BPS') ?? p.userHealthyRatio,
            userLiquidationRatio: readBps(env, 'USER_LIQUIDATION_RATIO_BPS') ?? p.userLiquidationRatio,
            lpHealthyRatio: readBps(env, 'LP_HEALTHY_RATIO_BPS') ?? p.lpHealthyRatio,
            lpLiquidationRatio: readBps(env, 'LP_LIQUIDATION_RATIO_BPS') ?? p.lpLiquidationRatio,
            lpLiquidationRewardBps: readBps(env, 'LP_LIQUIDATION_REWARD_BPS') ?? p.lpLiquidationRewardBps,
            protocolFeeBps: readBps(env, 'PROTOCOL_FEE_BPS') ?? p.protocolFeeBps,
        },
    });
}
