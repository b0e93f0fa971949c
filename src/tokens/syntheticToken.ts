/**
 * Synthetic Asset Token
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Holders own SHARES. The visible balance is
 *
 *   balanceOf(account) = shares * splitMultiplier / PRECISION
 *
 * A split (ratioNum:ratioDen) scales the multiplier once; every balance and
 * the total supply follow without touching any holder entry.
 *
 * The accounting variant decides where the multiplier comes from and what
 * extra bookkeeping a holder carries (see SyntheticAccounting).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PRECISION, ASSET_DECIMALS } from '../config/constants';
import { StatefulComponent } from '../state/transactor';
import { ConsistencyError, ValidationError } from '../core/errors';
import { mulDiv } from '../utils/math';
import logger from '../utils/logger';
import { SyntheticAccounting, SyntheticAccountingKind, SyntheticToken } from './types';

interface SyntheticTokenState {
    shares: Map<string, bigint>;
    totalShares: bigint;
    /** scaledBalance / reservePegged: split multiplier (PRECISION = 1x) */
    multiplier: bigint;
    /** reservePegged: reserve basis per holder */
    reserveBasis: Map<string, bigint>;
    /** priceScaled: current reference price */
    referencePrice: bigint;
}

function requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
        throw new ValidationError('InvalidAmount', 'token amount cannot be negative', { amount });
    }
}

export class InMemorySyntheticToken extends StatefulComponent<SyntheticTokenState> implements SyntheticToken {
    readonly decimals = ASSET_DECIMALS;
    readonly accounting: SyntheticAccountingKind;
    private readonly initialReferencePrice: bigint;

    constructor(
        readonly symbol: string,
        accounting: SyntheticAccounting = { kind: 'scaledBalance' }
    ) {
        const referencePrice = accounting.kind === 'priceScaled' ? accounting.referencePrice : PRECISION;
        if (referencePrice <= 0n) {
            throw new ValidationError('InvalidParameter', 'referencePrice must be positive');
        }
        super(`synthetic:${symbol}`, {
            shares: new Map(),
            totalShares: 0n,
            multiplier: PRECISION,
            reserveBasis: new Map(),
            referencePrice,
        });
        this.accounting = accounting.kind;
        this.initialReferencePrice = referencePrice;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    splitMultiplier(): bigint {
        switch (this.accounting) {
            case 'priceScaled':
                return mulDiv(this.initialReferencePrice, PRECISION, this.state.referencePrice);
            case 'scaledBalance':
            case 'reservePegged':
                return this.state.multiplier;
        }
    }

    /** priceScaled reference price; PRECISION for the other variants */
    referencePrice(): bigint {
        return this.state.referencePrice;
    }

    toShares(amount: bigint): bigint {
        return mulDiv(amount, PRECISION, this.splitMultiplier());
    }

    fromShares(shares: bigint): bigint {
        return mulDiv(shares, this.splitMultiplier(), PRECISION);
    }

    sharesOf(account: string): bigint {
        return this.state.shares.get(account) ?? 0n;
    }

    balanceOf(account: string): bigint {
        return this.fromShares(this.sharesOf(account));
    }

    totalShares(): bigint {
        return this.state.totalShares;
    }

    totalSupply(): bigint {
        return this.fromShares(this.state.totalShares);
    }

    reserveBalanceOf(account: string): bigint {
        return this.state.reserveBasis.get(account) ?? 0n;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    mintShares(account: string, shares: bigint, reserveValue: bigint = 0n): void {
        requireNonNegative(shares);
        requireNonNegative(reserveValue);
        this.state.shares.set(account, this.sharesOf(account) + shares);
        this.state.totalShares += shares;
        if (this.accounting === 'reservePegged' && reserveValue > 0n) {
            this.state.reserveBasis.set(account, this.reserveBalanceOf(account) + reserveValue);
        }
    }

    burnShares(account: string, shares: bigint): void {
        requireNonNegative(shares);
        const held = this.sharesOf(account);
        if (held < shares) {
            throw new ConsistencyError('InsufficientBalance', `${this.symbol} balance too low`, {
                account,
                shares: held,
                requested: shares,
            });
        }
        if (this.accounting === 'reservePegged' && held > 0n) {
            const basis = this.reserveBalanceOf(account);
            this.state.reserveBasis.set(account, basis - mulDiv(basis, shares, held));
        }
        this.state.shares.set(account, held - shares);
        this.state.totalShares -= shares;
    }

    transferShares(from: string, to: string, shares: bigint): void {
        requireNonNegative(shares);
        if (shares === 0n || from === to) {
            return;
        }
        const held = this.sharesOf(from);
        if (held < shares) {
            throw new ConsistencyError('InsufficientBalance', `${this.symbol} balance too low`, {
                account: from,
                shares: held,
                requested: shares,
            });
        }
        if (this.accounting === 'reservePegged') {
            const basis = this.reserveBalanceOf(from);
            const moved = mulDiv(basis, shares, held);
            this.state.reserveBasis.set(from, basis - moved);
            this.state.reserveBasis.set(to, this.reserveBalanceOf(to) + moved);
        }
        this.state.shares.set(from, held - shares);
        this.state.shares.set(to, this.sharesOf(to) + shares);
    }

    /**
     * Converts a token amount to shares. Moving a holder's whole balance moves
     * all of their shares so no dust is stranded by rounding.
     */
    private sharesFor(account: string, amount: bigint): bigint {
        requireNonNegative(amount);
        if (amount === this.balanceOf(account)) {
            return this.sharesOf(account);
        }
        return this.toShares(amount);
    }

    mint(account: string, amount: bigint, reserveValue: bigint = 0n): bigint {
        requireNonNegative(amount);
        const shares = this.toShares(amount);
        this.mintShares(account, shares, reserveValue);
        return shares;
    }

    burn(account: string, amount: bigint): bigint {
        const shares = this.sharesFor(account, amount);
        this.burnShares(account, shares);
        return shares;
    }

    transfer(from: string, to: string, amount: bigint): bigint {
        const shares = this.sharesFor(from, amount);
        this.transferShares(from, to, shares);
        return shares;
    }

    applySplit(ratioNum: bigint, ratioDen: bigint): void {
        if (ratioNum <= 0n || ratioDen <= 0n) {
            throw new ValidationError('InvalidSplit', 'split ratio terms must be positive', { ratioNum, ratioDen });
        }

        const before = this.splitMultiplier();
        switch (this.accounting) {
            case 'priceScaled':
                this.state.referencePrice = mulDiv(this.state.referencePrice, ratioDen, ratioNum);
                if (this.state.referencePrice === 0n) {
                    throw new ValidationError('InvalidSplit', 'split would zero the reference price', { ratioNum, ratioDen });
                }
                break;
            case 'scaledBalance':
            case 'reservePegged':
                this.state.multiplier = mulDiv(this.state.multiplier, ratioNum, ratioDen);
                if (this.state.multiplier === 0n) {
                    throw new ValidationError('InvalidSplit', 'split would zero the multiplier', { ratioNum, ratioDen });
                }
                break;
        }

        logger.info(
            `[SPLIT] token=${this.symbol} ratio=${ratioNum}:${ratioDen} ` +
            `multiplier=${before}->${this.splitMultiplier()} accounting=${this.accounting}`
        );
    }
}
