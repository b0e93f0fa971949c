/**
 * LP Ledger Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Liquidity requests apply at finalization, Σ committed stays equal to
 * totalCommitted, collateral requirements hold, and LP liquidation moves
 * committed liquidity plus a collateral reward to the liquidator.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { HealthTier } from '../src/policy/types';
import { LpRequestKind } from '../src/pool/types';
import {
    ADMIN,
    createHarness,
    expectProtocolError,
    PoolHarness,
    PRICE,
    USDC,
} from './helpers/poolHarness';

describe('LPLedger', () => {
    let h: PoolHarness;

    beforeEach(() => {
        h = createHarness();
        h.fund('lp1', USDC(1_000_000));
        h.fund('lp2', USDC(500_000));
    });

    describe('liquidity requests', () => {
        test('adding liquidity needs collateral; a failed add leaves no registration', () => {
            expectProtocolError(
                () => h.pool.lps.addLiquidity('lp1', USDC(100_000)),
                'ConsistencyError',
                'InsufficientCollateral'
            );
            expect(h.pool.lps.getLP('lp1')).toBeNull();
        });

        test('requests apply at finalization and keep the committed sum', () => {
            const { lps } = h.pool;
            lps.addCollateral('lp1', USDC(30_000));
            lps.addLiquidity('lp1', USDC(100_000));
            lps.addCollateral('lp2', USDC(15_000));
            lps.addLiquidity('lp2', USDC(50_000));
            expect(lps.pendingAdds()).toBe(USDC(150_000));
            expect(lps.totalCommitted()).toBe(0n);

            h.runCycle(PRICE(100));
            expect(lps.totalCommitted()).toBe(USDC(150_000));
            expect(lps.pendingAdds()).toBe(0n);
            expect(lps.activeLps()).toEqual(['lp1', 'lp2']);
            expect(lps.lpShare('lp1')).toBe(6_666n);

            const request = lps.reduceLiquidity('lp1', USDC(40_000));
            expect(request.kind).toBe(LpRequestKind.REDUCE);
            expect(lps.pendingReductions()).toBe(USDC(40_000));

            h.runCycle(PRICE(100));
            expect(lps.committedOf('lp1')).toBe(USDC(60_000));
            expect(lps.totalCommitted()).toBe(USDC(110_000));
            expect(lps.checkInvariants()).toEqual({ valid: true, errors: [] });
        });

        test('cancel drops a pending add', () => {
            h.pool.lps.addCollateral('lp1', USDC(30_000));
            h.pool.lps.addLiquidity('lp1', USDC(100_000));
            h.pool.lps.cancelRequest('lp1');

            expect(h.pool.lps.pendingAdds()).toBe(0n);
            expect(h.pool.lps.getRequest('lp1').kind).toBe(LpRequestKind.NONE);
        });
    });

    describe('committed LP', () => {
        beforeEach(() => {
            h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));
        });

        test('reductions are limited by committed and utilized liquidity', () => {
            expectProtocolError(
                () => h.pool.lps.reduceLiquidity('lp1', USDC(100_001)),
                'ConsistencyError',
                'InsufficientLiquidity'
            );

            h.fund('alice', USDC(12_000));
            h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));
            h.runCycle(PRICE(100));

            expectProtocolError(
                () => h.pool.lps.reduceLiquidity('lp1', USDC(90_001)),
                'ConsistencyError',
                'InsufficientLiquidity'
            );
            h.pool.lps.reduceLiquidity('lp1', USDC(90_000));
        });

        test('collateral cannot drop below the LP requirement', () => {
            expectProtocolError(
                () => h.pool.lps.reduceCollateral('lp1', 1n),
                'ConsistencyError',
                'InsufficientCollateral'
            );
            h.pool.lps.addCollateral('lp1', USDC(10_000));
            h.pool.lps.reduceCollateral('lp1', USDC(10_000));
            expect(h.pool.lps.getLP('lp1')?.collateral).toBe(USDC(30_000));
        });

        test('exit requires zero committed liquidity', () => {
            expectProtocolError(() => h.pool.lps.exitPool('lp1'), 'StateError', 'LiquidityCommitted');
            expectProtocolError(() => h.pool.lps.removeLP('lp1', 'lp1'), 'AuthorizationError', 'NotAdmin');

            h.pool.lps.reduceLiquidity('lp1', USDC(100_000));
            h.runCycle(PRICE(100));

            expect(h.pool.lps.removeLP(ADMIN, 'lp1')).toBe(USDC(30_000));
            expect(h.pool.lps.getLP('lp1')).toBeNull();
            expect(h.reserve.balanceOf('lp1')).toBe(USDC(1_000_000));
        });
    });

    describe('LP liquidation', () => {
        beforeEach(() => {
            h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));
            h.fund('alice', USDC(108_000));
            h.pool.users.depositRequest('alice', USDC(90_000), USDC(18_000));
            h.runCycle(PRICE(100));
            h.pool.users.claimAsset('alice');
            h.runCycle(PRICE(200), { acceptDeviation: true });

            h.fund('liq', USDC(100_000));
            h.fund('liq2', USDC(100_000));
        });

        test('exposure at the new price makes the LP liquidatable', () => {
            expect(h.pool.lps.lpExposure('lp1')).toBe(USDC(180_000));
            expect(h.pool.lps.lpHealth('lp1')).toBe(HealthTier.Liquidatable);
            expectProtocolError(() => h.pool.lps.liquidateLP('lp1', 'lp1', USDC(1)), 'ValidationError', 'SelfLiquidation');
            expectProtocolError(() => h.pool.lps.liquidateLP('liq', 'nobody', USDC(1)), 'NotFoundError', 'NotActiveLP');
            expectProtocolError(
                () => h.pool.lps.liquidateLP('liq', 'lp1', USDC(31_000)),
                'ValidationError',
                'ExcessiveAmount'
            );
        });

        test('replacement refunds escrow and the liquidation applies at finalization', () => {
            const { lps } = h.pool;
            const first = lps.liquidateLP('liq', 'lp1', USDC(20_000));
            expect(first.collateral).toBe(USDC(6_000));
            expect(h.reserve.balanceOf('liq')).toBe(USDC(94_000));

            expectProtocolError(
                () => lps.liquidateLP('liq2', 'lp1', USDC(20_000)),
                'ValidationError',
                'InsufficientLiquidationAmount'
            );
            lps.liquidateLP('liq2', 'lp1', USDC(30_000));
            expect(h.reserve.balanceOf('liq')).toBe(USDC(100_000));
            expect(h.reserve.balanceOf('liq2')).toBe(USDC(91_000));
            expect(lps.pendingLiquidation('lp1')).toEqual({ liquidator: 'liq2', amount: USDC(30_000), cycle: 3 });
            expectProtocolError(() => lps.reduceCollateral('lp1', 1n), 'StateError', 'PositionUnderLiquidation');

            h.runCycle(PRICE(200));

            expect(lps.getLP('lp1')).toMatchObject({
                committedLiquidity: USDC(70_000),
                collateral: USDC(29_550),
            });
            expect(lps.getLP('liq2')).toMatchObject({
                committedLiquidity: USDC(30_000),
                collateral: USDC(9_450),
            });
            expect(lps.totalCommitted()).toBe(USDC(100_000));
            expect(lps.activeLps()).toEqual(['lp1', 'liq2']);
            expect(lps.pendingLiquidation('lp1')).toBeNull();
        });
    });
});
