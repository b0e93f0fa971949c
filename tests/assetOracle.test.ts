/**
 * Asset Oracle Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Quote parsing, validation, update cooldown and split detection.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { InMemoryAssetOracle } from '../src/oracle/assetOracle';
import { createOracleConfig } from '../src/oracle/config';
import { ManualClock } from '../src/utils/clock';
import { expectProtocolError, PRICE } from './helpers/poolHarness';

describe('InMemoryAssetOracle', () => {
    let clock: ManualClock;
    let oracle: InMemoryAssetOracle;

    beforeEach(() => {
        clock = new ManualClock(1_000);
        oracle = new InMemoryAssetOracle('AAPL', clock);
    });

    test('parses decimal quotes into 18-decimal fixed point', () => {
        const quote = oracle.updatePrice({ open: '120', high: 125.5, low: '119.25', close: '123.45' }, true);

        expect(quote.close).toBe(123_450_000_000_000_000_000n);
        expect(quote.high).toBe(125_500_000_000_000_000_000n);
        expect(quote.timestamp).toBe(1_000);
        expect(oracle.currentPrice()).toBe(quote.close);
        expect(oracle.isMarketOpen()).toBe(true);
        expect(oracle.lastUpdateTimestamp()).toBe(1_000);
    });

    test('rejects malformed quotes', () => {
        expectProtocolError(
            () => oracle.updatePrice({ open: 1n, high: PRICE(1), low: PRICE(2), close: PRICE(1) }),
            'ValidationError',
            'InvalidQuote'
        );
        expectProtocolError(() => oracle.setPrice(0n), 'ValidationError', 'InvalidQuote');
        expect(oracle.ohlc()).toBeNull();
    });

    test('enforces the update cooldown when configured', () => {
        const throttled = new InMemoryAssetOracle('AAPL', clock, createOracleConfig({ minUpdateInterval: 60 }));
        throttled.setPrice(PRICE(100));

        clock.advance(59);
        expectProtocolError(() => throttled.setPrice(PRICE(101)), 'StateError', 'UpdateCooldown');

        clock.advance(1);
        expect(throttled.setPrice(PRICE(101)).close).toBe(PRICE(101));
    });

    describe('split detection', () => {
        beforeEach(() => {
            oracle.setPrice(PRICE(100));
        });

        test('ordinary moves are not flagged', () => {
            oracle.setPrice(PRICE(139));
            expect(oracle.splitDetected()).toBe(false);
        });

        test('a large move flags a split and remembers the previous close', () => {
            oracle.setPrice(PRICE(50));
            oracle.setPrice(PRICE(51));

            expect(oracle.splitDetected()).toBe(true);
            expect(oracle.preSplitPrice()).toBe(PRICE(100));
            expect(oracle.verifySplit(2n, 1n)).toBe(true);
            expect(oracle.verifySplit(3n, 1n)).toBe(false);
        });

        test('ratio matching allows the configured tolerance', () => {
            oracle.setPrice(PRICE(34));
            expect(oracle.verifySplit(3n, 1n)).toBe(true);

            oracle.setPrice(PRICE(35));
            expect(oracle.verifySplit(3n, 1n)).toBe(false);
        });

        test('clearSplit resets detection', () => {
            oracle.setPrice(PRICE(50));
            oracle.clearSplit();

            expect(oracle.splitDetected()).toBe(false);
            expect(oracle.preSplitPrice()).toBe(0n);
            expect(oracle.verifySplit(2n, 1n)).toBe(false);
        });
    });
});
