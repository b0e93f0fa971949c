/**
 * Token interfaces consumed and driven by the pool.
 */

/**
 * Reserve (collateral) token. Exact-amount transfers, no fee on transfer.
 */
export interface ReserveToken {
    readonly symbol: string;
    readonly decimals: number;

    balanceOf(account: string): bigint;
    allowance(owner: string, spender: string): bigint;
    totalSupply(): bigint;
    approve(owner: string, spender: string, amount: bigint): void;
    transfer(from: string, to: string, amount: bigint): void;
    transferFrom(spender: string, from: string, to: string, amount: bigint): void;
}

/**
 * Accounting variant of the synthetic token, selected at construction.
 *
 * - scaledBalance: balances are shares times the split multiplier
 * - reservePegged: scaledBalance plus each holder's reserve basis
 * - priceScaled:   shares are held at a reference price; a split lowers the
 *                  reference price, which scales every balance
 */
export type SyntheticAccounting =
    | { kind: 'scaledBalance' }
    | { kind: 'reservePegged' }
    | { kind: 'priceScaled'; referencePrice: bigint };

export type SyntheticAccountingKind = SyntheticAccounting['kind'];

/**
 * Synthetic asset token. Balances reflect the split multiplier; the pool
 * keeps its own records in shares so a split needs no per-holder rewrite.
 */
export interface SyntheticToken {
    readonly symbol: string;
    readonly decimals: number;
    readonly accounting: SyntheticAccountingKind;

    balanceOf(account: string): bigint;
    sharesOf(account: string): bigint;
    totalSupply(): bigint;
    totalShares(): bigint;
    splitMultiplier(): bigint;

    toShares(amount: bigint): bigint;
    fromShares(shares: bigint): bigint;

    mint(account: string, amount: bigint, reserveValue?: bigint): bigint;
    burn(account: string, amount: bigint): bigint;
    mintShares(account: string, shares: bigint, reserveValue?: bigint): void;
    burnShares(account: string, shares: bigint): void;
    transfer(from: string, to: string, amount: bigint): bigint;
    transferShares(from: string, to: string, shares: bigint): void;
    applySplit(ratioNum: bigint, ratioDen: bigint): void;

    /** Reserve basis of a holder; zero outside the reservePegged variant */
    reserveBalanceOf(account: string): bigint;
}
