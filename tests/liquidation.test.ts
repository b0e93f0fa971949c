/**
 * User Liquidation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * alice: 10,000 USDC at $100 with 2,000 collateral (20%).
 * bob:   10,000 USDC at $100 with 10,000 collateral.
 * The price doubles; an admin accepts the move. alice's collateral is now
 * ~10% of a 20,000 USDC position (below the 12.5% liquidation ratio).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { HealthTier } from '../src/policy/types';
import { UserRequestKind } from '../src/pool/types';
import {
    createHarness,
    debtBetween,
    expectProtocolError,
    PoolHarness,
    PRICE,
    TOKENS,
    USDC,
} from './helpers/poolHarness';

describe('user liquidation', () => {
    let h: PoolHarness;

    beforeEach(() => {
        h = createHarness();
        h.fund('lp1', USDC(1_000_000));
        h.commitLiquidity('lp1', USDC(30_000), USDC(100_000));

        h.fund('alice', USDC(12_000));
        h.fund('bob', USDC(20_000));
        h.pool.users.depositRequest('alice', USDC(10_000), USDC(2_000));
        h.pool.users.depositRequest('bob', USDC(10_000), USDC(10_000));
        h.runCycle(PRICE(100));
        h.pool.users.claimAsset('alice');
        h.pool.users.claimAsset('bob');

        h.runCycle(PRICE(200), { acceptDeviation: true });
        h.pool.synthetic.transfer('bob', 'dave', TOKENS(40));
    });

    test('health follows the settled price', () => {
        expect(h.pool.book.lastSettlementPrice()).toBe(PRICE(200));
        expect(h.pool.users.positionValue('alice')).toBe(USDC(20_000));
        expect(h.pool.users.userHealth('alice')).toBe(HealthTier.Liquidatable);
        expect(h.pool.users.userHealth('bob')).toBe(HealthTier.Healthy);
    });

    test('rejects healthy targets, self liquidation and oversized amounts', () => {
        const { users } = h.pool;
        expectProtocolError(() => users.liquidationRequest('alice', 'bob', TOKENS(10)), 'ConsistencyError', 'NotLiquidatable');
        expectProtocolError(() => users.liquidationRequest('alice', 'alice', TOKENS(10)), 'ValidationError', 'SelfLiquidation');
        expectProtocolError(() => users.liquidationRequest('bob', 'alice', TOKENS(31)), 'ValidationError', 'ExcessiveAmount');
    });

    test('a strictly larger request replaces and refunds the previous liquidator', () => {
        const { users, synthetic } = h.pool;
        const first = users.liquidationRequest('bob', 'alice', TOKENS(20));
        expect(first.kind).toBe(UserRequestKind.LIQUIDATE);
        expect(first.principal).toBe(USDC(2_000));
        expect(synthetic.balanceOf('bob')).toBe(TOKENS(40));

        expectProtocolError(
            () => users.liquidationRequest('dave', 'alice', TOKENS(20)),
            'ValidationError',
            'InsufficientLiquidationAmount'
        );

        users.liquidationRequest('dave', 'alice', TOKENS(25));
        expect(synthetic.balanceOf('bob')).toBe(TOKENS(60));
        expect(synthetic.balanceOf('dave')).toBe(TOKENS(15));
        expect(users.getRequest('bob').kind).toBe(UserRequestKind.NONE);
        expect(users.pendingLiquidation('alice')).toEqual({ liquidator: 'dave', amount: TOKENS(25), cycle: 3 });
        expect(h.pool.cycles.getCycle(3).totalRedemptionShares).toBe(TOKENS(25));

        expectProtocolError(
            () => users.redemptionRequest('alice', TOKENS(10)),
            'StateError',
            'PositionUnderLiquidation'
        );
    });

    test('liquidator cancel returns the escrowed tokens', () => {
        h.pool.users.liquidationRequest('dave', 'alice', TOKENS(25));
        h.pool.users.cancelRequest('dave');

        expect(h.pool.synthetic.balanceOf('dave')).toBe(TOKENS(40));
        expect(h.pool.users.pendingLiquidation('alice')).toBeNull();
        expect(h.pool.cycles.getCycle(3).totalRedemptionShares).toBe(0n);
    });

    test('settled liquidation pays the liquidator and shrinks the target', () => {
        h.pool.users.liquidationRequest('dave', 'alice', TOKENS(25));
        const index = h.pool.users.getPosition('alice')?.interestIndex ?? 0n;
        h.runCycle(PRICE(200));

        expect(h.pool.cycles.getCycle(3).netFlow).toBe(-USDC(5_000));
        expectProtocolError(
            () => h.pool.users.liquidationRequest('bob', 'alice', TOKENS(10)),
            'StateError',
            'LiquidationPendingClaim'
        );

        const debt = debtBetween(USDC(2_500), index, h.pool.cycles.getCycle(3).interestIndex);
        const claim = h.pool.users.claimReserve('dave');

        expect(claim.interestPaid).toBe(debt);
        expect(claim.amount).toBe(USDC(5_000) + USDC(500) - debt);
        expect(h.reserve.balanceOf('dave')).toBe(claim.amount);
        expect(h.pool.users.getPosition('alice')).toMatchObject({
            assetShares: TOKENS(75),
            principal: USDC(7_500),
            collateral: USDC(1_500),
        });
        expect(h.pool.users.pendingLiquidation('alice')).toBeNull();
    });
});
