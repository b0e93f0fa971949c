/**
 * Pool test harness: one pool on a manual clock with an in-memory reserve,
 * oracle and capability service, plus helpers to walk whole cycles.
 */

import { PRECISION } from '../../src/config/constants';
import { CycleParameters, PolicyParameters } from '../../src/config/parameters';
import { ErrorKind, isProtocolError } from '../../src/core/errors';
import { InMemoryAssetOracle } from '../../src/oracle/assetOracle';
import { DefaultPoolStrategy } from '../../src/policy/defaultStrategy';
import { AssetPool, createAssetPool } from '../../src/pool/factory';
import { PoolState } from '../../src/pool/types';
import { InMemoryCapabilityService } from '../../src/registry/capabilities';
import { InMemoryReserveToken } from '../../src/tokens/reserveToken';
import { SyntheticAccounting } from '../../src/tokens/types';
import { ManualClock } from '../../src/utils/clock';

export const ADMIN = 'admin';

/** Whole reserve units (6 decimals) */
export const USDC = (n: number): bigint => BigInt(n) * 1_000_000n;

/** Whole synthetic tokens (18 decimals) */
export const TOKENS = (n: number): bigint => BigInt(n) * PRECISION;

/** Whole-dollar price (18 decimals) */
export const PRICE = (n: number): bigint => BigInt(n) * PRECISION;

const UNLIMITED = 10n ** 30n;

export interface HarnessOptions {
    cycle?: Partial<CycleParameters>;
    policy?: Partial<PolicyParameters>;
    accounting?: SyntheticAccounting;
}

export interface CycleRunOptions {
    /** Admin accepts a price move beyond tolerance */
    acceptDeviation?: boolean;
    /** Admin confirms a split num:den */
    split?: { num: bigint; den: bigint };
    /** Settle every active LP (default true) */
    settle?: boolean;
}

export interface PoolHarness {
    clock: ManualClock;
    reserve: InMemoryReserveToken;
    oracle: InMemoryAssetOracle;
    strategy: DefaultPoolStrategy;
    capabilities: InMemoryCapabilityService;
    pool: AssetPool;

    /** Mint reserve to an account and approve the pool to pull it */
    fund(account: string, amount: bigint): void;
    /** Post collateral and queue liquidity, then run one cycle so it is committed */
    commitLiquidity(lp: string, collateral: bigint, committed: bigint, price?: bigint): void;
    /** ACTIVE -> REBALANCING_OFFCHAIN with the market open at `price` */
    openOffchain(price: bigint): void;
    /** REBALANCING_OFFCHAIN -> REBALANCING_ONCHAIN with the market closed at `price` */
    openOnchain(price: bigint): void;
    /** Settle every unsettled active LP at `price` */
    settleAll(price: bigint): void;
    /** One full cycle at `price` */
    runCycle(price: bigint, options?: CycleRunOptions): void;
}

export function createHarness(options: HarnessOptions = {}): PoolHarness {
    const clock = new ManualClock(1_700_000_000);
    const reserve = new InMemoryReserveToken('USDC', 6);
    const oracle = new InMemoryAssetOracle('AAPL', clock);
    const strategy = new DefaultPoolStrategy(options.policy ?? {});
    const capabilities = new InMemoryCapabilityService({
        admins: [ADMIN],
        oracles: ['AAPL'],
        strategies: [strategy.id],
    });
    const pool = createAssetPool({
        symbol: 'AAPL',
        accounting: options.accounting,
        config: { cycle: options.cycle },
        strategy,
        oracle,
        reserve,
        capabilities,
        clock,
        poolId: 'test',
    });

    const fund = (account: string, amount: bigint): void => {
        reserve.mint(account, amount);
        reserve.approve(account, pool.account, UNLIMITED);
    };

    const openOffchain = (price: bigint): void => {
        clock.advance(pool.config.cycle.cycleLength);
        oracle.setPrice(price, true);
        pool.cycles.initiateOffchainRebalance();
    };

    const openOnchain = (price: bigint): void => {
        clock.advance(pool.config.cycle.rebalanceLength);
        oracle.setPrice(price, false);
        pool.cycles.initiateOnchainRebalance();
    };

    const settleAll = (price: bigint): void => {
        const cycle = pool.book.current();
        for (const lp of cycle.activeLps) {
            if (pool.book.poolState() !== PoolState.REBALANCING_ONCHAIN) break;
            if (pool.book.settledFlow(lp) === undefined) {
                pool.cycles.rebalancePool(lp, price);
            }
        }
    };

    const runCycle = (price: bigint, run: CycleRunOptions = {}): void => {
        openOffchain(price);
        if (run.acceptDeviation) {
            pool.cycles.resolvePriceDeviation(ADMIN, false, 1n, 1n);
        }
        if (run.split) {
            pool.cycles.resolvePriceDeviation(ADMIN, true, run.split.num, run.split.den);
        }
        openOnchain(price);
        if (run.settle !== false) {
            settleAll(price);
        }
    };

    const commitLiquidity = (lp: string, collateral: bigint, committed: bigint, price: bigint = PRICE(100)): void => {
        pool.lps.addCollateral(lp, collateral);
        pool.lps.addLiquidity(lp, committed);
        runCycle(price);
    };

    return {
        clock,
        reserve,
        oracle,
        strategy,
        capabilities,
        pool,
        fund,
        commitLiquidity,
        openOffchain,
        openOnchain,
        settleAll,
        runCycle,
    };
}

/** Run `fn`, returning what it threw; fails the test when it does not throw */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected the operation to throw');
}

export function expectProtocolError(fn: () => unknown, kind: ErrorKind, code: string): void {
    const err = catchError(fn);
    expect(isProtocolError(err)).toBe(true);
    if (isProtocolError(err)) {
        expect(err.kind).toBe(kind);
        expect(err.code).toBe(code);
    }
}

/** Interest owed on `principal` between two index readings, as the ledger computes it */
export function debtBetween(principal: bigint, fromIndex: bigint, toIndex: bigint): bigint {
    return (principal * (toIndex - fromIndex)) / PRECISION;
}
