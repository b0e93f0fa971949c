/**
 * User Ledger — Pending Requests and Settled Positions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Users queue one request at a time (DEPOSIT, REDEEM or LIQUIDATE). Requests
 * escrow their funds in pool custody and settle at the cycle's price; the
 * result is claimed afterwards by anyone on the user's behalf.
 *
 * POSITION:
 *   assetShares   synthetic shares minted against the position
 *   principal     reserve deposited, the base interest accrues on
 *   collateral    reserve backing the position
 *   interestIndex principal-weighted index the debt is measured from
 *
 *   debt = principal * (index - position.interestIndex) / PRECISION
 *
 * Interest debt is kept by the pool on every payout and funds LP interest.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS, POOL_LIMITS, PRECISION } from '../config/constants';
import {
    ConsistencyError,
    NotFoundError,
    StateError,
    ValidationError,
    requirePositive,
    requirePrincipal,
} from '../core/errors';
import { HealthTier, PoolStrategy } from '../policy/types';
import { StatefulComponent, Transactor } from '../state/transactor';
import { ReserveToken, SyntheticToken } from '../tokens/types';
import { generateRequestId } from '../utils/id';
import logger from '../utils/logger';
import { formatUnits, minBig, mulDiv } from '../utils/math';
import { amountToShares, PriceConverter, sharesToAmount } from './conversion';
import { CycleIntake } from './cycleBook';
import { requireNotHalted, requirePoolState } from './guards';
import {
    CycleRecord,
    LiquidationClaim,
    PoolState,
    UserPosition,
    UserRequest,
    UserRequestKind,
} from './types';

interface UserLedgerState {
    requests: Map<string, UserRequest>;
    positions: Map<string, UserPosition>;
    /** target → pending liquidation */
    liquidations: Map<string, LiquidationClaim>;
}

/**
 * Committed liquidity as the LP ledger reports it.
 */
export interface LiquidityView {
    totalCommitted(): bigint;
    pendingAdds(): bigint;
    pendingReductions(): bigint;
}

export interface UserLedgerDeps {
    poolAccount: string;
    book: CycleIntake;
    strategy: PoolStrategy;
    synthetic: SyntheticToken;
    reserve: ReserveToken;
    converter: PriceConverter;
    liquidity: LiquidityView;
    transactor: Transactor;
}

export interface ClaimResult {
    /** Reserve paid, or synthetic minted for claimAsset */
    amount: bigint;
    /** Interest debt retained by the pool */
    interestPaid: bigint;
}

/** Interest owed on `principal` between two index readings */
export function interestDebt(principal: bigint, fromIndex: bigint, toIndex: bigint): bigint {
    if (toIndex <= fromIndex || principal === 0n) {
        return 0n;
    }
    return mulDiv(principal, toIndex - fromIndex, PRECISION);
}

function emptyRequest(cycle: number): UserRequest {
    return {
        id: '',
        kind: UserRequestKind.NONE,
        amount: 0n,
        collateral: 0n,
        principal: 0n,
        target: null,
        cycle,
    };
}

export class UserLedger extends StatefulComponent<UserLedgerState> {
    private readonly pool: string;
    private readonly book: CycleIntake;
    private readonly strategy: PoolStrategy;
    private readonly synthetic: SyntheticToken;
    private readonly reserve: ReserveToken;
    private readonly converter: PriceConverter;
    private readonly liquidity: LiquidityView;
    private readonly tx: Transactor;

    constructor(deps: UserLedgerDeps) {
        super(`user-ledger:${deps.poolAccount}`, {
            requests: new Map(),
            positions: new Map(),
            liquidations: new Map(),
        });
        this.pool = deps.poolAccount;
        this.book = deps.book;
        this.strategy = deps.strategy;
        this.synthetic = deps.synthetic;
        this.reserve = deps.reserve;
        this.converter = deps.converter;
        this.liquidity = deps.liquidity;
        this.tx = deps.transactor;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getRequest(user: string): UserRequest {
        const request = this.state.requests.get(user);
        return request ? { ...request } : emptyRequest(this.book.currentCycle());
    }

    getPosition(user: string): UserPosition | null {
        const position = this.state.positions.get(user);
        return position ? { ...position } : null;
    }

    pendingLiquidation(target: string): LiquidationClaim | null {
        const claim = this.state.liquidations.get(target);
        return claim ? { ...claim } : null;
    }

    interestDebt(user: string): bigint {
        const position = this.state.positions.get(user);
        if (!position) {
            return 0n;
        }
        return interestDebt(position.principal, position.interestIndex, this.book.cumulativeIndex());
    }

    /** Reserve value of the position's synthetic at the last settlement price */
    positionValue(user: string): bigint {
        const position = this.state.positions.get(user);
        const price = this.book.lastSettlementPrice();
        if (!position || price === 0n) {
            return 0n;
        }
        return this.converter.reserveFromAsset(this.synthetic.fromShares(position.assetShares), price);
    }

    userHealth(user: string): HealthTier {
        const position = this.state.positions.get(user);
        if (!position) {
            return HealthTier.Healthy;
        }
        const net = position.collateral - this.interestDebt(user);
        return this.strategy.userHealth(net, this.positionValue(user));
    }

    positionCount(): number {
        return this.state.positions.size;
    }

    /**
     * Shares the deposits queued in `cycle` mint once claimed, floored per
     * request as claimAsset floors them.
     */
    depositSharesDue(cycle: Readonly<CycleRecord>): bigint {
        let shares = 0n;
        for (const request of this.state.requests.values()) {
            if (request.kind === UserRequestKind.DEPOSIT && request.cycle === cycle.index) {
                shares += this.depositShares(request.amount, cycle);
            }
        }
        return shares;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REQUESTS
    // ═══════════════════════════════════════════════════════════════════════════

    depositRequest(user: string, amount: bigint, collateral: bigint): UserRequest {
        return this.tx.run('depositRequest', user, () => {
            this.requireUser(user);
            requirePoolState(this.book, 'depositRequest', PoolState.ACTIVE);
            this.requireNoRequest(user);
            requirePositive(amount);
            if (collateral < 0n) {
                throw new ValidationError('InvalidAmount', 'collateral cannot be negative', { collateral });
            }

            const required = this.strategy.requiredCollateral(amount, this.strategy.parameters.userHealthyRatio);
            if (collateral < required) {
                throw new ConsistencyError('InsufficientCollateral', 'deposit collateral below the healthy ratio', {
                    collateral,
                    required,
                });
            }

            const available = this.strategy.availableLiquidity({
                totalCommitted: this.liquidity.totalCommitted(),
                pendingAdds: this.liquidity.pendingAdds(),
                pendingReductions: this.liquidity.pendingReductions(),
                utilized: this.book.outstandingValue() + this.book.current().totalDeposits,
            });
            if (available < amount) {
                throw new ConsistencyError('InsufficientLiquidity', 'not enough LP liquidity for this deposit', {
                    amount,
                    available,
                });
            }

            this.reserve.transferFrom(this.pool, user, this.pool, amount + collateral);

            const request: UserRequest = {
                id: generateRequestId('dep'),
                kind: UserRequestKind.DEPOSIT,
                amount,
                collateral,
                principal: 0n,
                target: null,
                cycle: this.book.currentCycle(),
            };
            this.state.requests.set(user, request);
            this.book.recordDeposit(amount);

            logger.info(
                `[USER-LEDGER] deposit user=${user} amount=${formatUnits(amount, this.reserve.decimals)} ` +
                `collateral=${formatUnits(collateral, this.reserve.decimals)} cycle=${request.cycle}`
            );
            return { ...request };
        });
    }

    redemptionRequest(user: string, amount: bigint): UserRequest {
        return this.tx.run('redemptionRequest', user, () => {
            this.requireUser(user);
            requirePoolState(this.book, 'redemptionRequest', PoolState.ACTIVE);
            this.requireNoRequest(user);
            requirePositive(amount);
            this.requireNotUnderLiquidation(user);

            const balance = this.synthetic.balanceOf(user);
            if (balance < amount) {
                throw new ConsistencyError('InsufficientBalance', 'synthetic balance below redemption amount', {
                    balance,
                    amount,
                });
            }

            const position = this.state.positions.get(user);
            const shares = this.synthetic.transfer(user, this.pool, amount);
            if (!position || position.assetShares < shares) {
                throw new ConsistencyError('InsufficientPosition', 'redemption exceeds the user position', {
                    shares,
                    positionShares: position?.assetShares ?? 0n,
                });
            }

            const principal = mulDiv(position.principal, shares, position.assetShares);
            const request: UserRequest = {
                id: generateRequestId('red'),
                kind: UserRequestKind.REDEEM,
                amount: shares,
                collateral: 0n,
                principal,
                target: null,
                cycle: this.book.currentCycle(),
            };
            this.state.requests.set(user, request);
            this.book.recordRedemption(shares, principal);

            logger.info(
                `[USER-LEDGER] redeem user=${user} amount=${formatUnits(amount)} shares=${shares} cycle=${request.cycle}`
            );
            return { ...request };
        });
    }

    liquidationRequest(liquidator: string, target: string, amount: bigint): UserRequest {
        return this.tx.run('liquidationRequest', liquidator, () => {
            this.requireUser(liquidator);
            requirePrincipal(target, 'target');
            requirePoolState(this.book, 'liquidationRequest', PoolState.ACTIVE);
            if (liquidator === target) {
                throw new ValidationError('SelfLiquidation', 'a user cannot liquidate their own position');
            }
            this.requireNoRequest(liquidator);
            requirePositive(amount);

            const position = this.state.positions.get(target);
            if (!position) {
                throw new NotFoundError('NoPosition', `no position for ${target}`, { target });
            }
            const targetRequest = this.state.requests.get(target);
            if (targetRequest?.kind === UserRequestKind.REDEEM) {
                throw new StateError('TargetRequestPending', 'target has a pending redemption', { target });
            }
            if (this.userHealth(target) !== HealthTier.Liquidatable) {
                throw new ConsistencyError('NotLiquidatable', `${target} is not liquidatable`, { target });
            }

            const positionAmount = this.synthetic.fromShares(position.assetShares);
            if (amount * BPS > positionAmount * POOL_LIMITS.MAX_LIQUIDATION_BPS) {
                throw new ValidationError('ExcessiveAmount', 'liquidation above 30% of the position', {
                    amount,
                    positionAmount,
                });
            }

            const currentCycle = this.book.currentCycle();
            const existing = this.state.liquidations.get(target);
            if (existing) {
                if (existing.cycle < currentCycle) {
                    throw new StateError('LiquidationPendingClaim', 'a settled liquidation on the target is unclaimed', {
                        target,
                        liquidator: existing.liquidator,
                    });
                }
                if (amount <= existing.amount) {
                    throw new ValidationError(
                        'InsufficientLiquidationAmount',
                        'a replacement liquidation must be strictly larger',
                        { amount, existing: existing.amount }
                    );
                }
                this.refundLiquidation(existing.liquidator);
                logger.info(
                    `[LIQUIDATION] replaced target=${target} previous=${existing.liquidator} ` +
                    `by=${liquidator} amount=${formatUnits(existing.amount)}->${formatUnits(amount)}`
                );
            }

            const balance = this.synthetic.balanceOf(liquidator);
            if (balance < amount) {
                throw new ConsistencyError('InsufficientBalance', 'liquidator balance below amount', {
                    balance,
                    amount,
                });
            }
            const shares = this.synthetic.transfer(liquidator, this.pool, amount);
            if (shares > position.assetShares) {
                throw new ValidationError('ExcessiveAmount', 'liquidation exceeds the target position', {
                    shares,
                    positionShares: position.assetShares,
                });
            }

            const principal = mulDiv(position.principal, shares, position.assetShares);
            const request: UserRequest = {
                id: generateRequestId('liq'),
                kind: UserRequestKind.LIQUIDATE,
                amount: shares,
                collateral: 0n,
                principal,
                target,
                cycle: currentCycle,
            };
            this.state.requests.set(liquidator, request);
            this.state.liquidations.set(target, { liquidator, amount, cycle: currentCycle });
            this.book.recordRedemption(shares, principal);

            logger.info(
                `[LIQUIDATION] user target=${target} liquidator=${liquidator} ` +
                `amount=${formatUnits(amount)} cycle=${currentCycle}`
            );
            return { ...request };
        });
    }

    cancelRequest(user: string): void {
        this.tx.run('cancelRequest', user, () => {
            const request = this.state.requests.get(user);
            if (!request) {
                throw new NotFoundError('NoPendingRequest', `no pending request for ${user}`, { user });
            }
            const state = this.book.poolState();
            if (request.cycle !== this.book.currentCycle()
                || (state !== PoolState.ACTIVE && state !== PoolState.HALTED)) {
                throw new StateError('RequestAlreadyProcessing', 'request is already being settled', {
                    cycle: request.cycle,
                    state,
                });
            }

            switch (request.kind) {
                case UserRequestKind.DEPOSIT:
                    this.reserve.transfer(this.pool, user, request.amount + request.collateral);
                    this.book.recordDeposit(-request.amount);
                    this.state.requests.delete(user);
                    break;
                case UserRequestKind.REDEEM:
                    this.synthetic.transferShares(this.pool, user, request.amount);
                    this.book.recordRedemption(-request.amount, -request.principal);
                    this.state.requests.delete(user);
                    break;
                case UserRequestKind.LIQUIDATE:
                    this.refundLiquidation(user);
                    break;
                case UserRequestKind.NONE:
                    throw new ConsistencyError('CorruptRequest', 'stored request has kind NONE', { user });
            }

            logger.info(`[USER-LEDGER] cancel user=${user} kind=${request.kind} cycle=${request.cycle}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CLAIMS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Mint the synthetic of a settled deposit to `target`. Anyone may call.
     */
    claimAsset(target: string): ClaimResult {
        return this.tx.run('claimAsset', target, () => {
            const request = this.state.requests.get(target);
            if (!request || request.kind !== UserRequestKind.DEPOSIT) {
                throw new NotFoundError('NothingToClaim', `no deposit to claim for ${target}`, { target });
            }
            const cycle = this.settledCycle(request);

            const shares = this.depositShares(request.amount, cycle);
            this.synthetic.mintShares(target, shares, request.amount);

            const position = this.state.positions.get(target);
            if (position) {
                const principal = position.principal + request.amount;
                position.interestIndex =
                    (position.principal * position.interestIndex + request.amount * cycle.interestIndex) / principal;
                position.principal = principal;
                position.collateral += request.collateral;
                position.assetShares += shares;
            } else {
                this.state.positions.set(target, {
                    assetShares: shares,
                    principal: request.amount,
                    collateral: request.collateral,
                    interestIndex: cycle.interestIndex,
                });
            }
            this.state.requests.delete(target);

            const minted = this.synthetic.fromShares(shares);
            logger.info(
                `[USER-LEDGER] claimAsset user=${target} minted=${formatUnits(minted)} cycle=${request.cycle}`
            );
            return { amount: minted, interestPaid: 0n };
        });
    }

    /**
     * Pay out a settled redemption or liquidation. Anyone may call for `target`.
     */
    claimReserve(target: string): ClaimResult {
        return this.tx.run('claimReserve', target, () => {
            const request = this.state.requests.get(target);
            if (!request
                || (request.kind !== UserRequestKind.REDEEM && request.kind !== UserRequestKind.LIQUIDATE)) {
                throw new NotFoundError('NothingToClaim', `no redemption to claim for ${target}`, { target });
            }
            const cycle = this.settledCycle(request);

            const owner = request.kind === UserRequestKind.LIQUIDATE ? request.target : target;
            if (owner === null) {
                throw new ConsistencyError('CorruptRequest', 'liquidation request without a target', { target });
            }

            const value = this.converter.reserveFromAsset(
                sharesToAmount(request.amount, cycle.splitMultiplier),
                cycle.settlementPrice
            );
            const released = this.shrinkPosition(owner, request.amount, request.principal, cycle.interestIndex);
            const payout = value + released.net;

            this.synthetic.burnShares(this.pool, request.amount);
            this.reserve.transfer(this.pool, target, payout);
            this.state.requests.delete(target);
            if (request.kind === UserRequestKind.LIQUIDATE) {
                this.state.liquidations.delete(owner);
            }

            logger.info(
                `[USER-LEDGER] claimReserve ${request.kind.toLowerCase()} recipient=${target} owner=${owner} ` +
                `payout=${formatUnits(payout, this.reserve.decimals)} debt=${formatUnits(released.debt, this.reserve.decimals)}`
            );
            return { amount: payout, interestPaid: released.debt };
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // COLLATERAL
    // ═══════════════════════════════════════════════════════════════════════════

    addCollateral(user: string, amount: bigint): void {
        this.tx.run('addCollateral', user, () => {
            requireNotHalted(this.book, 'addCollateral');
            requirePositive(amount);
            const position = this.requirePosition(user);
            this.reserve.transferFrom(this.pool, user, this.pool, amount);
            position.collateral += amount;
            logger.info(`[USER-LEDGER] addCollateral user=${user} amount=${formatUnits(amount, this.reserve.decimals)}`);
        });
    }

    reduceCollateral(user: string, amount: bigint): void {
        this.tx.run('reduceCollateral', user, () => {
            requirePoolState(this.book, 'reduceCollateral', PoolState.ACTIVE);
            requirePositive(amount);
            this.requireNoRequest(user);
            this.requireNotUnderLiquidation(user);
            const position = this.requirePosition(user);
            if (amount > position.collateral) {
                throw new ConsistencyError('InsufficientCollateral', 'amount exceeds posted collateral', {
                    amount,
                    collateral: position.collateral,
                });
            }

            const remaining = position.collateral - amount - this.interestDebt(user);
            const required = this.strategy.requiredCollateral(
                this.positionValue(user),
                this.strategy.parameters.userHealthyRatio
            );
            if (remaining < required) {
                throw new ConsistencyError('InsufficientCollateral', 'remaining collateral below the healthy ratio', {
                    remaining,
                    required,
                });
            }

            position.collateral -= amount;
            this.reserve.transfer(this.pool, user, amount);
            logger.info(`[USER-LEDGER] reduceCollateral user=${user} amount=${formatUnits(amount, this.reserve.decimals)}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // HALTED EXIT
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Burn `amount` synthetic for a pro-rata share of the halt reserve plus
     * the position's collateral net of interest debt.
     */
    exitPool(user: string, amount: bigint): ClaimResult {
        return this.tx.run('exitPool', user, () => {
            if (this.book.poolState() !== PoolState.HALTED) {
                throw new StateError('PoolNotHalted', 'exitPool is only available while HALTED');
            }
            requirePositive(amount);
            this.requireNoRequest(user);
            const halt = this.book.haltSnapshot();
            if (halt === null) {
                throw new ConsistencyError('NotHalted', 'pool is HALTED without a halt snapshot');
            }
            const balance = this.synthetic.balanceOf(user);
            if (balance < amount) {
                throw new ConsistencyError('InsufficientBalance', 'synthetic balance below exit amount', {
                    balance,
                    amount,
                });
            }

            const shares = this.synthetic.burn(user, amount);
            const reservePart = halt.supplyShares === 0n ? 0n : mulDiv(halt.exitReserve, shares, halt.supplyShares);

            let principal = 0n;
            let released = { net: 0n, debt: 0n };
            const position = this.state.positions.get(user);
            if (position && position.assetShares > 0n) {
                const covered = minBig(shares, position.assetShares);
                principal = mulDiv(position.principal, covered, position.assetShares);
                released = this.shrinkPosition(user, covered, principal, this.book.cumulativeIndex());
            }

            this.book.recordHaltExit(shares, principal, reservePart);
            const payout = reservePart + released.net;
            this.reserve.transfer(this.pool, user, payout);

            logger.info(
                `[HALT] user exit user=${user} burned=${formatUnits(amount)} ` +
                `reserve=${formatUnits(reservePart, this.reserve.decimals)} collateral=${formatUnits(released.net, this.reserve.decimals)}`
            );
            return { amount: payout, interestPaid: released.debt };
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private depositShares(amount: bigint, cycle: Readonly<CycleRecord>): bigint {
        return amountToShares(this.converter.assetFromReserve(amount, cycle.settlementPrice), cycle.splitMultiplier);
    }

    /**
     * Remove `shares` and `principal` from a position, releasing the
     * proportional collateral net of the interest debt up to `index`.
     */
    private shrinkPosition(
        owner: string,
        shares: bigint,
        principal: bigint,
        index: bigint
    ): { net: bigint; debt: bigint } {
        const position = this.state.positions.get(owner);
        if (!position || position.assetShares < shares) {
            throw new ConsistencyError('PositionMismatch', 'position smaller than the settled request', {
                owner,
                shares,
                positionShares: position?.assetShares ?? 0n,
            });
        }

        const collateral = mulDiv(position.collateral, shares, position.assetShares);
        const owed = interestDebt(principal, position.interestIndex, index);
        const debt = minBig(owed, collateral);
        if (owed > collateral) {
            logger.warn(
                `[USER-LEDGER] interest shortfall owner=${owner} owed=${owed} collateral=${collateral}`
            );
        }

        position.assetShares -= shares;
        position.principal -= principal;
        position.collateral -= collateral;
        if (position.assetShares === 0n) {
            // the last slice takes all remaining collateral, so nothing is stranded
            this.state.positions.delete(owner);
        }
        return { net: collateral - debt, debt };
    }

    private settledCycle(request: UserRequest): CycleRecord {
        if (request.cycle >= this.book.currentCycle()) {
            throw new StateError('RequestNotSettled', `cycle ${request.cycle} has not settled`, {
                cycle: request.cycle,
            });
        }
        return this.book.getCycle(request.cycle);
    }

    private refundLiquidation(liquidator: string): void {
        const request = this.state.requests.get(liquidator);
        if (!request || request.kind !== UserRequestKind.LIQUIDATE || request.target === null) {
            throw new ConsistencyError('CorruptRequest', 'liquidation claim without its request', { liquidator });
        }
        this.synthetic.transferShares(this.pool, liquidator, request.amount);
        this.book.recordRedemption(-request.amount, -request.principal);
        this.state.requests.delete(liquidator);
        this.state.liquidations.delete(request.target);
    }

    private requireUser(user: string): void {
        requirePrincipal(user, 'user');
        if (user === this.pool) {
            throw new ValidationError('InvalidAddress', 'pool custody cannot act as a user');
        }
    }

    private requireNoRequest(user: string): void {
        const pending = this.state.requests.get(user);
        if (pending) {
            throw new StateError('RequestPending', `${user} already has a pending ${pending.kind} request`, {
                user,
                kind: pending.kind,
                cycle: pending.cycle,
            });
        }
    }

    private requireNotUnderLiquidation(user: string): void {
        if (this.state.liquidations.has(user)) {
            throw new StateError('PositionUnderLiquidation', `${user} has a pending liquidation`, { user });
        }
    }

    private requirePosition(user: string): UserPosition {
        const position = this.state.positions.get(user);
        if (!position) {
            throw new NotFoundError('NoPosition', `no position for ${user}`, { user });
        }
        return position;
    }
}
