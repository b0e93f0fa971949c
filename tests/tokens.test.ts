/**
 * Token Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Reserve: balances, allowances, exact transfers.
 * Synthetic: share accounting under every variant, splits, whole-balance moves.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PRECISION } from '../src/config/constants';
import { InMemoryReserveToken } from '../src/tokens/reserveToken';
import { InMemorySyntheticToken } from '../src/tokens/syntheticToken';
import { expectProtocolError, PRICE, TOKENS, USDC } from './helpers/poolHarness';

describe('InMemoryReserveToken', () => {
    let token: InMemoryReserveToken;

    beforeEach(() => {
        token = new InMemoryReserveToken('USDC', 6);
        token.mint('alice', USDC(100));
    });

    test('transfers move exact amounts', () => {
        token.transfer('alice', 'bob', USDC(40));
        expect(token.balanceOf('alice')).toBe(USDC(60));
        expect(token.balanceOf('bob')).toBe(USDC(40));
        expect(token.totalSupply()).toBe(USDC(100));
    });

    test('rejects overdrafts and negative amounts', () => {
        expectProtocolError(() => token.transfer('alice', 'bob', USDC(101)), 'ConsistencyError', 'InsufficientBalance');
        expectProtocolError(() => token.transfer('alice', 'bob', -1n), 'ValidationError', 'InvalidAmount');
    });

    test('transferFrom spends the allowance', () => {
        expectProtocolError(
            () => token.transferFrom('pool', 'alice', 'pool', USDC(1)),
            'ConsistencyError',
            'InsufficientAllowance'
        );

        token.approve('alice', 'pool', USDC(50));
        token.transferFrom('pool', 'alice', 'pool', USDC(30));
        expect(token.allowance('alice', 'pool')).toBe(USDC(20));
        expect(token.balanceOf('pool')).toBe(USDC(30));
    });

    test('an owner moving its own funds needs no allowance', () => {
        token.transferFrom('alice', 'alice', 'bob', USDC(10));
        expect(token.balanceOf('bob')).toBe(USDC(10));
    });
});

describe('InMemorySyntheticToken', () => {
    test('scaledBalance: a split scales balances without touching shares', () => {
        const token = new InMemorySyntheticToken('sAAPL');
        token.mint('alice', TOKENS(10));
        token.applySplit(2n, 1n);

        expect(token.splitMultiplier()).toBe(2n * PRECISION);
        expect(token.balanceOf('alice')).toBe(TOKENS(20));
        expect(token.sharesOf('alice')).toBe(TOKENS(10));
        expect(token.totalSupply()).toBe(TOKENS(20));
    });

    test('moving a whole balance moves every share after an uneven split', () => {
        const token = new InMemorySyntheticToken('sAAPL');
        token.mint('alice', TOKENS(10));
        token.applySplit(3n, 1n);

        const moved = token.transfer('alice', 'bob', TOKENS(10));
        expect(moved).toBe(3_333_333_333_333_333_333n);
        expect(token.balanceOf('alice')).toBe(20_000_000_000_000_000_001n);

        token.burn('alice', token.balanceOf('alice'));
        expect(token.sharesOf('alice')).toBe(0n);
        expect(token.totalShares()).toBe(3_333_333_333_333_333_333n);
    });

    test('priceScaled: a split lowers the reference price', () => {
        const token = new InMemorySyntheticToken('sAAPL', { kind: 'priceScaled', referencePrice: PRICE(100) });
        token.mint('alice', TOKENS(10));
        token.applySplit(2n, 1n);

        expect(token.referencePrice()).toBe(PRICE(50));
        expect(token.splitMultiplier()).toBe(2n * PRECISION);
        expect(token.balanceOf('alice')).toBe(TOKENS(20));

        token.applySplit(3n, 1n);
        expect(token.splitMultiplier()).toBe(6n * PRECISION);
    });

    test('reservePegged: reserve basis follows shares', () => {
        const token = new InMemorySyntheticToken('sAAPL', { kind: 'reservePegged' });
        token.mint('alice', TOKENS(10), USDC(1_000));
        token.transfer('alice', 'bob', TOKENS(4));

        expect(token.reserveBalanceOf('alice')).toBe(USDC(600));
        expect(token.reserveBalanceOf('bob')).toBe(USDC(400));

        token.burn('bob', TOKENS(2));
        expect(token.reserveBalanceOf('bob')).toBe(USDC(200));
    });

    test('rejects overdrafts and invalid split terms', () => {
        const token = new InMemorySyntheticToken('sAAPL');
        token.mint('alice', TOKENS(1));

        expectProtocolError(() => token.burn('alice', TOKENS(2)), 'ConsistencyError', 'InsufficientBalance');
        expectProtocolError(() => token.applySplit(0n, 1n), 'ValidationError', 'InvalidSplit');
        expect(token.splitMultiplier()).toBe(PRECISION);
    });
});
