import BigNumber from 'bignumber.js';
import { BPS } from '../config/constants';

export const toBigNumber = (value: string | number | bigint): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/** floor(a * b / d) */
export const mulDiv = (a: bigint, b: bigint, d: bigint): bigint => {
    if (d === 0n) {
        throw new RangeError('mulDiv: division by zero');
    }
    return (a * b) / d;
};

/** ceil(a * b / d) for non-negative operands */
export const mulDivUp = (a: bigint, b: bigint, d: bigint): bigint => {
    if (d === 0n) {
        throw new RangeError('mulDivUp: division by zero');
    }
    const product = a * b;
    return product === 0n ? 0n : (product - 1n) / d + 1n;
};

export const minBig = (a: bigint, b: bigint): bigint => (a < b ? a : b);

export const maxBig = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export const absDiff = (a: bigint, b: bigint): bigint => (a > b ? a - b : b - a);

/**
 * True when `value` is within `toleranceBps` of `reference`.
 * A zero reference only accepts zero.
 */
export const withinTolerance = (value: bigint, reference: bigint, toleranceBps: bigint): boolean => {
    return absDiff(value, reference) * BPS <= reference * toleranceBps;
};

/**
 * Parse a decimal quote ("123.45", 123.45) into a fixed-point integer.
 * Digits beyond `decimals` are rounded half-up.
 */
export const parseUnits = (value: string | number, decimals: number = 18): bigint => {
    const bn = toBigNumber(value);
    if (!bn.isFinite()) {
        throw new RangeError(`parseUnits: not a finite number: ${value}`);
    }
    const scaled = bn.shiftedBy(decimals).integerValue(BigNumber.ROUND_HALF_UP);
    return BigInt(scaled.toFixed(0));
};

/** Render a fixed-point integer as a decimal string for logs */
export const formatUnits = (value: bigint, decimals: number = 18, dp: number = 4): string => {
    return toBigNumber(value).shiftedBy(-decimals).toFixed(dp, BigNumber.ROUND_DOWN);
};

export const formatPrice = (price: bigint): string => formatUnits(price, 18, 2);

export const formatBps = (bps: bigint): string => `${toBigNumber(bps).dividedBy(100).toFixed(2)}%`;
