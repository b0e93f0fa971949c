import { ASSET_DECIMALS, PRECISION } from '../config/constants';
import { ValidationError } from '../core/errors';
import { mulDiv } from '../utils/math';

/**
 * Reserve ↔ synthetic conversion at a PRECISION-scaled price.
 *
 *   assetFromReserve(r, P) = r * decimalFactor * PRECISION / P
 *   reserveFromAsset(a, P) = a * P / (PRECISION * decimalFactor)
 *
 * decimalFactor = 10^(18 - reserveDecimals). Both directions floor.
 */
export class PriceConverter {
    readonly decimalFactor: bigint;

    constructor(readonly reserveDecimals: number) {
        if (!Number.isInteger(reserveDecimals) || reserveDecimals < 0 || reserveDecimals > ASSET_DECIMALS) {
            throw new ValidationError('InvalidParameter', `reserveDecimals out of range: ${reserveDecimals}`);
        }
        this.decimalFactor = 10n ** BigInt(ASSET_DECIMALS - reserveDecimals);
    }

    assetFromReserve(reserve: bigint, price: bigint): bigint {
        requirePrice(price);
        return mulDiv(reserve * this.decimalFactor, PRECISION, price);
    }

    reserveFromAsset(asset: bigint, price: bigint): bigint {
        requirePrice(price);
        return mulDiv(asset, price, PRECISION * this.decimalFactor);
    }
}

function requirePrice(price: bigint): void {
    if (price <= 0n) {
        throw new ValidationError('InvalidPrice', 'price must be positive', { price });
    }
}

/** Shares held at `multiplier` → token amount */
export function sharesToAmount(shares: bigint, multiplier: bigint): bigint {
    return mulDiv(shares, multiplier, PRECISION);
}

/** Token amount at `multiplier` → shares */
export function amountToShares(amount: bigint, multiplier: bigint): bigint {
    return mulDiv(amount, PRECISION, multiplier);
}

/** Pro-rata slice of a signed amount, rounding toward zero */
export function proRata(amount: bigint, part: bigint, whole: bigint): bigint {
    if (whole === 0n) {
        return 0n;
    }
    return amount >= 0n ? mulDiv(amount, part, whole) : -mulDiv(-amount, part, whole);
}
