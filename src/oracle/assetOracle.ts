/**
 * In-Memory Asset Oracle
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Holds the latest OHLC quote for one asset, the market-open flag reported by
 * the feed, and split detection state.
 *
 * SPLIT DETECTION:
 *   A new close more than splitDetectionBps away from the previous close sets
 *   splitDetected and remembers the previous close as preSplitPrice. The flag
 *   stays set until clearSplit(). verifySplit(num, den) holds when
 *   current * num / den is within splitToleranceBps of preSplitPrice.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS } from '../config/constants';
import { StatefulComponent } from '../state/transactor';
import { StateError, ValidationError } from '../core/errors';
import { Clock } from '../utils/clock';
import logger from '../utils/logger';
import { absDiff, formatPrice, mulDiv, parseUnits, withinTolerance } from '../utils/math';
import { DEFAULT_ORACLE_CONFIG } from './config';
import { AssetOracle, AssetOracleConfig, OhlcInput, OhlcQuote } from './types';

interface OracleState {
    quote: OhlcQuote | null;
    lastUpdated: number;
    marketOpen: boolean;
    splitDetected: boolean;
    preSplitPrice: bigint;
}

function toFixed(value: string | number | bigint): bigint {
    return typeof value === 'bigint' ? value : parseUnits(value, 18);
}

export class InMemoryAssetOracle extends StatefulComponent<OracleState> implements AssetOracle {
    constructor(
        readonly symbol: string,
        private readonly clock: Clock,
        private readonly config: AssetOracleConfig = DEFAULT_ORACLE_CONFIG
    ) {
        super(`oracle:${symbol}`, {
            quote: null,
            lastUpdated: 0,
            marketOpen: false,
            splitDetected: false,
            preSplitPrice: 0n,
        });
    }

    currentPrice(): bigint {
        return this.state.quote?.close ?? 0n;
    }

    isMarketOpen(): boolean {
        return this.state.marketOpen;
    }

    lastUpdateTimestamp(): number {
        return this.state.lastUpdated;
    }

    ohlc(): OhlcQuote | null {
        return this.state.quote === null ? null : { ...this.state.quote };
    }

    splitDetected(): boolean {
        return this.state.splitDetected;
    }

    preSplitPrice(): bigint {
        return this.state.preSplitPrice;
    }

    verifySplit(ratioNum: bigint, ratioDen: bigint): boolean {
        if (!this.state.splitDetected || ratioNum <= 0n || ratioDen <= 0n) {
            return false;
        }
        const implied = mulDiv(this.currentPrice(), ratioNum, ratioDen);
        return withinTolerance(implied, this.state.preSplitPrice, this.config.splitToleranceBps);
    }

    /**
     * Accept a new quote from the feed. The close becomes the current price.
     */
    updatePrice(input: OhlcInput, marketOpen: boolean = this.state.marketOpen): OhlcQuote {
        const now = this.clock.now();
        if (this.config.minUpdateInterval > 0
            && this.state.lastUpdated > 0
            && now - this.state.lastUpdated < this.config.minUpdateInterval) {
            throw new StateError('UpdateCooldown', `${this.symbol} updated ${now - this.state.lastUpdated}s ago`, {
                cooldown: this.config.minUpdateInterval,
            });
        }

        const quote: OhlcQuote = {
            open: toFixed(input.open),
            high: toFixed(input.high),
            low: toFixed(input.low),
            close: toFixed(input.close),
            timestamp: input.timestamp ?? now,
        };
        if (quote.close <= 0n || quote.low <= 0n || quote.high < quote.low) {
            throw new ValidationError('InvalidQuote', `${this.symbol} quote is malformed`, {
                close: quote.close,
                high: quote.high,
                low: quote.low,
            });
        }

        const previous = this.currentPrice();
        if (previous > 0n && !this.state.splitDetected
            && absDiff(quote.close, previous) * BPS > previous * this.config.splitDetectionBps) {
            this.state.splitDetected = true;
            this.state.preSplitPrice = previous;
            logger.warn(
                `[ORACLE] ${this.symbol} possible split: close ${formatPrice(previous)} -> ${formatPrice(quote.close)}`
            );
        }

        this.state.quote = quote;
        this.state.lastUpdated = now;
        this.state.marketOpen = marketOpen;
        return { ...quote };
    }

    /** Convenience for feeds that only report a last price */
    setPrice(price: string | number | bigint, marketOpen: boolean = this.state.marketOpen): OhlcQuote {
        return this.updatePrice({ open: price, high: price, low: price, close: price }, marketOpen);
    }

    setMarketOpen(open: boolean): void {
        this.state.marketOpen = open;
    }

    clearSplit(): void {
        this.state.splitDetected = false;
        this.state.preSplitPrice = 0n;
    }
}
