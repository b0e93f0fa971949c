/**
 * Cycle Orchestrator Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Phase gating (deadlines, market hours, oracle freshness), pro-rata LP
 * settlement with last-settler dust, interest snapshots and fees, forced
 * settlement and the no-liquidity halt.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PoolState } from '../src/pool/types';
import {
    ADMIN,
    createHarness,
    expectProtocolError,
    PoolHarness,
    PRICE,
    TOKENS,
    USDC,
} from './helpers/poolHarness';

describe('CycleOrchestrator', () => {
    let h: PoolHarness;

    beforeEach(() => {
        h = createHarness();
        h.fund('lp1', USDC(1_000_000));
    });

    describe('phase transitions', () => {
        beforeEach(() => {
            h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));
        });

        test('each phase enforces its deadline, market hours and oracle freshness', () => {
            const { cycles } = h.pool;
            expectProtocolError(() => cycles.initiateOffchainRebalance(), 'StateError', 'CycleInProgress');

            h.clock.advance(h.pool.config.cycle.cycleLength);
            h.oracle.setPrice(PRICE(100), false);
            expectProtocolError(() => cycles.initiateOffchainRebalance(), 'StateError', 'MarketClosed');

            h.oracle.setMarketOpen(true);
            cycles.initiateOffchainRebalance();
            expect(cycles.getState()).toBe(PoolState.REBALANCING_OFFCHAIN);
            expectProtocolError(() => cycles.initiateOnchainRebalance(), 'StateError', 'RebalancePeriodActive');

            h.clock.advance(h.pool.config.cycle.rebalanceLength);
            expectProtocolError(() => cycles.initiateOnchainRebalance(), 'StateError', 'MarketOpen');

            h.oracle.setMarketOpen(false);
            expectProtocolError(() => cycles.initiateOnchainRebalance(), 'StalenessError', 'OracleStale');

            h.oracle.setPrice(PRICE(100), false);
            const record = cycles.initiateOnchainRebalance();
            expect(record.settlementPrice).toBe(PRICE(100));
            expect(record.activeLps).toEqual(['lp1']);
            expect(cycles.getState()).toBe(PoolState.REBALANCING_ONCHAIN);
        });

        test('LP settlement checks membership, price and declared amount', () => {
            h.openOffchain(PRICE(100));
            h.openOnchain(PRICE(100));
            const { cycles } = h.pool;

            expect(cycles.lpObligation('lp1')).toEqual({ lp: 'lp1', flow: 0n, isContribution: false, amount: 0n });
            expectProtocolError(() => cycles.rebalancePool('stranger', PRICE(100)), 'StateError', 'NotActiveLP');
            expectProtocolError(() => cycles.rebalancePool('lp1', PRICE(200)), 'StalenessError', 'PriceDeviationHigh');
            expectProtocolError(() => cycles.rebalancePool('lp1', PRICE(100), 5n), 'ValidationError', 'RebalanceMismatch');

            const result = cycles.rebalancePool('lp1', PRICE(100));
            expect(result.finalized).toBe(true);
            expect(cycles.getState()).toBe(PoolState.ACTIVE);
            expect(cycles.currentCycle()).toBe(2);
            expect(cycles.getCycle(1).state).toBe('SETTLED');
        });
    });

    describe('pro-rata settlement', () => {
        beforeEach(() => {
            h.fund('lp2', USDC(500_000));
            h.pool.lps.addCollateral('lp1', USDC(30_000));
            h.pool.lps.addLiquidity('lp1', USDC(100_000));
            h.pool.lps.addCollateral('lp2', USDC(15_000));
            h.pool.lps.addLiquidity('lp2', USDC(50_000));
            h.runCycle(PRICE(100));

            h.fund('alice', USDC(20_000));
            h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));
        });

        test('the last settler absorbs rounding so flows sum to the net flow', () => {
            h.openOffchain(PRICE(100));
            h.openOnchain(PRICE(100));
            const { cycles } = h.pool;

            expect(cycles.getCycle(1).netFlow).toBe(USDC(10_000));
            expect(cycles.lpObligation('lp1').flow).toBe(6_666_666_666n);
            expect(cycles.lpObligation('lp2').flow).toBe(3_333_333_333n);

            const first = cycles.rebalancePool('lp2', PRICE(100));
            expect(first.obligation.flow).toBe(3_333_333_333n);
            expect(first.finalized).toBe(false);
            expectProtocolError(() => cycles.rebalancePool('lp2', PRICE(100)), 'StateError', 'AlreadySettled');

            expectProtocolError(
                () => cycles.rebalancePool('lp1', PRICE(100), undefined, true),
                'ValidationError',
                'RebalanceMismatch'
            );
            const last = cycles.rebalancePool('lp1', PRICE(100), 6_666_666_667n, false);
            expect(last.finalized).toBe(true);
            expect(first.obligation.flow + last.obligation.flow).toBe(USDC(10_000));

            expect(h.reserve.balanceOf('lp1')).toBe(USDC(970_000) + 6_666_666_667n);
            expect(h.reserve.balanceOf('lp2')).toBe(USDC(485_000) + 3_333_333_333n);
        });

        test('float is locked until the LP settles', () => {
            h.pool.lps.deposit('lp1', USDC(1_000));
            h.openOffchain(PRICE(100));
            h.openOnchain(PRICE(100));

            expectProtocolError(() => h.pool.lps.withdraw('lp1', USDC(1_000)), 'StateError', 'SettlementPending');

            h.settleAll(PRICE(100));
            h.pool.lps.withdraw('lp1', USDC(1_000));
            expect(h.pool.lps.getLP('lp1')?.float).toBe(0n);
        });
    });

    describe('interest', () => {
        beforeEach(() => {
            h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));
            h.fund('alice', USDC(20_000));
            h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));
            h.runCycle(PRICE(100));
            h.pool.users.claimAsset('alice');
            h.runCycle(PRICE(100));
        });

        test('index compounds over the elapsed time at the utilization rate', () => {
            const previous = h.pool.cycles.getCycle(1);
            const cycle = h.pool.cycles.getCycle(2);
            const elapsed = BigInt(h.pool.config.cycle.cycleLength + h.pool.config.cycle.rebalanceLength);

            expect(cycle.utilization).toBe(1_000n);
            expect(cycle.interestRate).toBe(600n);
            expect(cycle.interestIndex).toBe(
                previous.interestIndex + (previous.interestIndex * 600n * elapsed) / (10_000n * 31_536_000n)
            );
            expect(cycle.interestAccrued).toBe(
                (USDC(10_000) * (cycle.interestIndex - previous.interestIndex)) / 10n ** 18n
            );
            expect(h.pool.cycles.cumulativeIndex()).toBe(cycle.interestIndex);
        });

        test('interest is split between the LP and protocol fees', () => {
            const accrued = h.pool.cycles.getCycle(2).interestAccrued;
            const fee = (accrued * 1_000n) / 10_000n;
            expect(fee).toBeGreaterThan(0n);

            expect(h.pool.cycles.protocolFees()).toBe(fee);
            expect(h.pool.lps.getLP('lp1')?.accruedInterest).toBe(accrued - fee);

            expect(h.pool.lps.claimInterest('lp1')).toBe(accrued - fee);
            expectProtocolError(() => h.pool.lps.claimInterest('lp1'), 'NotFoundError', 'NothingToClaim');

            expectProtocolError(() => h.pool.cycles.claimProtocolFees('lp1', 'lp1'), 'AuthorizationError', 'NotAdmin');
            expect(h.pool.cycles.claimProtocolFees(ADMIN, 'treasury')).toBe(fee);
            expect(h.reserve.balanceOf('treasury')).toBe(fee);
            expectProtocolError(() => h.pool.cycles.claimProtocolFees(ADMIN, 'treasury'), 'NotFoundError', 'NothingToClaim');
        });

        test('telemetry records one sample per finalized cycle', () => {
            const metrics = h.pool.telemetry.computeCycleMetrics();
            const accrued = h.pool.cycles.getCycle(2).interestAccrued;

            expect(metrics.cycles).toBe(3);
            expect(metrics.totalNetFlow).toBe(USDC(10_000));
            expect(metrics.totalInterest).toBe(accrued);
            expect(metrics.totalProtocolFees).toBe((accrued * 1_000n) / 10_000n);
            expect(metrics.forcedSettlements).toBe(0);
            expect(metrics.maxPriceMoveBps).toBe(0n);
            expect(h.pool.telemetry.recentSamples(1)[0].cycle).toBe(2);
        });
    });

    describe('forceRebalanceLP', () => {
        beforeEach(() => {
            h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));
            h.fund('alice', USDC(20_000));
            h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));
            h.runCycle(PRICE(100));
            h.pool.users.claimAsset('alice');
            h.pool.users.redemptionRequest('alice', TOKENS(50));
            h.pool.lps.deposit('lp1', USDC(10_000));
            h.openOffchain(PRICE(100));
            h.openOnchain(PRICE(100));
        });

        test('waits for the halt threshold and then settles from float', () => {
            const { cycles } = h.pool;
            expect(cycles.lpObligation('lp1')).toEqual({
                lp: 'lp1',
                flow: -USDC(5_000),
                isContribution: true,
                amount: USDC(5_000),
            });

            expectProtocolError(() => cycles.forceRebalanceLP(ADMIN, 'lp1'), 'StateError', 'HaltThresholdNotReached');
            h.clock.advance(h.pool.config.cycle.haltThreshold);
            expectProtocolError(() => cycles.forceRebalanceLP('alice', 'lp1'), 'AuthorizationError', 'NotAdmin');

            const result = cycles.forceRebalanceLP(ADMIN, 'lp1');
            expect(result.outcome).toBe('SETTLED');
            if (result.outcome === 'SETTLED') {
                expect(result.settlement.fromFloat).toBe(USDC(5_000));
                expect(result.settlement.fromCollateral).toBe(0n);
                expect(result.finalized).toBe(true);
            }
            expect(h.pool.lps.getLP('lp1')?.float).toBe(USDC(5_000));
            expect(h.pool.telemetry.recentSamples(1)[0].forcedSettlements).toBe(1);
            expect(cycles.getState()).toBe(PoolState.ACTIVE);
        });
    });

    describe('no committed liquidity', () => {
        test('a net flow with no active LP halts the pool and requests can be unwound', () => {
            h.pool.lps.addCollateral('lp1', USDC(30_000));
            h.pool.lps.addLiquidity('lp1', USDC(100_000));
            h.fund('alice', USDC(12_000));
            h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));

            h.openOffchain(PRICE(100));
            h.openOnchain(PRICE(100));

            expect(h.pool.cycles.getState()).toBe(PoolState.HALTED);
            expect(h.pool.cycles.haltSnapshot()).toMatchObject({
                cycle: 0,
                price: PRICE(100),
                supplyShares: 0n,
                exitReserve: 0n,
            });

            h.pool.users.cancelRequest('alice');
            expect(h.reserve.balanceOf('alice')).toBe(USDC(12_000));
            expect(h.pool.lps.exitPool('lp1')).toBe(USDC(30_000));
            expect(h.reserve.balanceOf('lp1')).toBe(USDC(1_000_000));
        });
    });
});
