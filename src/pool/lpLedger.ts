/**
 * LP Ledger — Committed Liquidity, Collateral, Float and Interest
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every LP has:
 *   committedLiquidity  reserve the LP stands behind; pro-rata share of every
 *                       cycle's net flow and interest
 *   collateral          posted in pool custody; backs forced settlement and
 *                       the halt reserve
 *   float               settlement float, debited first by contributions
 *   accruedInterest     credited at finalization, paid by claimInterest
 *
 * INVARIANTS (HARD RULES):
 *   1. totalCommitted === Σ committedLiquidity
 *   2. pendingAdds / pendingReductions === Σ pending ADD / REDUCE amounts
 *   3. At most one pending request per LP
 *
 * ADD / REDUCE / LIQUIDATE requests only take effect when their cycle
 * finalizes (applyCycleRequests).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS, POOL_LIMITS } from '../config/constants';
import {
    ConsistencyError,
    NotFoundError,
    StateError,
    ValidationError,
    requirePositive,
    requirePrincipal,
} from '../core/errors';
import { HealthTier, PoolStrategy } from '../policy/types';
import { CapabilityService } from '../registry/capabilities';
import { StatefulComponent, Transactor } from '../state/transactor';
import { ReserveToken } from '../tokens/types';
import { Clock } from '../utils/clock';
import { generateRequestId } from '../utils/id';
import logger from '../utils/logger';
import { formatUnits, maxBig, minBig, mulDiv } from '../utils/math';
import { CycleIntake } from './cycleBook';
import { requireNotHalted, requirePoolState } from './guards';
import { LiquidationClaim, LpPosition, LpRequest, LpRequestKind, PoolState } from './types';
import { LiquidityView } from './userLedger';

interface LpLedgerState {
    lps: Map<string, LpPosition>;
    requests: Map<string, LpRequest>;
    /** target → pending liquidation */
    liquidations: Map<string, LiquidationClaim>;
    totalCommitted: bigint;
    pendingAdds: bigint;
    pendingReductions: bigint;
}

export interface LpLedgerDeps {
    poolAccount: string;
    book: CycleIntake;
    strategy: PoolStrategy;
    reserve: ReserveToken;
    capabilities: CapabilityService;
    clock: Clock;
    transactor: Transactor;
}

export interface LpInvariantCheck {
    valid: boolean;
    errors: string[];
}

export interface FlowSettlement {
    fromFloat: bigint;
    fromWallet: bigint;
    fromCollateral: bigint;
    paid: bigint;
}

function emptyRequest(cycle: number): LpRequest {
    return {
        id: '',
        kind: LpRequestKind.NONE,
        amount: 0n,
        collateral: 0n,
        target: null,
        cycle,
    };
}

export class LPLedger extends StatefulComponent<LpLedgerState> implements LiquidityView {
    private readonly pool: string;
    private readonly book: CycleIntake;
    private readonly strategy: PoolStrategy;
    private readonly reserve: ReserveToken;
    private readonly capabilities: CapabilityService;
    private readonly clock: Clock;
    private readonly tx: Transactor;

    constructor(deps: LpLedgerDeps) {
        super(`lp-ledger:${deps.poolAccount}`, {
            lps: new Map(),
            requests: new Map(),
            liquidations: new Map(),
            totalCommitted: 0n,
            pendingAdds: 0n,
            pendingReductions: 0n,
        });
        this.pool = deps.poolAccount;
        this.book = deps.book;
        this.strategy = deps.strategy;
        this.reserve = deps.reserve;
        this.capabilities = deps.capabilities;
        this.clock = deps.clock;
        this.tx = deps.transactor;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getLP(lp: string): LpPosition | null {
        const position = this.state.lps.get(lp);
        return position ? { ...position } : null;
    }

    getRequest(lp: string): LpRequest {
        const request = this.state.requests.get(lp);
        return request ? { ...request } : emptyRequest(this.book.currentCycle());
    }

    pendingLiquidation(target: string): LiquidationClaim | null {
        const claim = this.state.liquidations.get(target);
        return claim ? { ...claim } : null;
    }

    totalCommitted(): bigint {
        return this.state.totalCommitted;
    }

    pendingAdds(): bigint {
        return this.state.pendingAdds;
    }

    pendingReductions(): bigint {
        return this.state.pendingReductions;
    }

    committedOf(lp: string): bigint {
        return this.state.lps.get(lp)?.committedLiquidity ?? 0n;
    }

    /** LPs with committed liquidity, in registration order */
    activeLps(): string[] {
        const active: string[] = [];
        for (const [lp, position] of this.state.lps) {
            if (position.committedLiquidity > 0n) {
                active.push(lp);
            }
        }
        return active;
    }

    registeredLps(): string[] {
        return [...this.state.lps.keys()];
    }

    /** Share of total committed liquidity, in bps */
    lpShare(lp: string): bigint {
        if (this.state.totalCommitted === 0n) {
            return 0n;
        }
        return mulDiv(this.committedOf(lp), BPS, this.state.totalCommitted);
    }

    /** LP's pro-rata share of the outstanding synthetic value */
    lpExposure(lp: string): bigint {
        if (this.state.totalCommitted === 0n) {
            return 0n;
        }
        return mulDiv(this.book.outstandingValue(), this.committedOf(lp), this.state.totalCommitted);
    }

    lpHealth(lp: string): HealthTier {
        const position = this.state.lps.get(lp);
        if (!position) {
            return HealthTier.Healthy;
        }
        return this.strategy.lpHealth(position.collateral, this.lpExposure(lp));
    }

    checkInvariants(): LpInvariantCheck {
        const errors: string[] = [];
        let committed = 0n;
        for (const position of this.state.lps.values()) {
            committed += position.committedLiquidity;
            if (position.collateral < 0n || position.float < 0n || position.committedLiquidity < 0n) {
                errors.push('negative LP balance');
            }
        }
        if (committed !== this.state.totalCommitted) {
            errors.push(`Σ committed ${committed} !== totalCommitted ${this.state.totalCommitted}`);
        }

        let adds = 0n;
        let reductions = 0n;
        for (const request of this.state.requests.values()) {
            if (request.kind === LpRequestKind.ADD) adds += request.amount;
            if (request.kind === LpRequestKind.REDUCE) reductions += request.amount;
        }
        if (adds !== this.state.pendingAdds) {
            errors.push(`Σ pending adds ${adds} !== pendingAdds ${this.state.pendingAdds}`);
        }
        if (reductions !== this.state.pendingReductions) {
            errors.push(`Σ pending reductions ${reductions} !== pendingReductions ${this.state.pendingReductions}`);
        }
        return { valid: errors.length === 0, errors };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // COLLATERAL & FLOAT
    // ═══════════════════════════════════════════════════════════════════════════

    addCollateral(lp: string, amount: bigint): void {
        this.tx.run('lpAddCollateral', lp, () => {
            this.requireLpPrincipal(lp);
            requireNotHalted(this.book, 'addCollateral');
            requirePositive(amount);
            this.reserve.transferFrom(this.pool, lp, this.pool, amount);
            this.register(lp).collateral += amount;
            logger.info(`[LP-LEDGER] addCollateral lp=${lp} amount=${this.fmt(amount)}`);
        });
    }

    reduceCollateral(lp: string, amount: bigint): void {
        this.tx.run('lpReduceCollateral', lp, () => {
            requirePoolState(this.book, 'reduceCollateral', PoolState.ACTIVE);
            requirePositive(amount);
            const position = this.requireLp(lp);
            if (this.state.liquidations.has(lp)) {
                throw new StateError('PositionUnderLiquidation', `${lp} has a pending liquidation`, { lp });
            }
            if (amount > position.collateral) {
                throw new ConsistencyError('InsufficientCollateral', 'amount exceeds posted collateral', {
                    amount,
                    collateral: position.collateral,
                });
            }

            const ratio = this.strategy.parameters.lpHealthyRatio;
            const request = this.state.requests.get(lp);
            const pendingAdd = request?.kind === LpRequestKind.ADD ? request.amount : 0n;
            const required = maxBig(
                this.strategy.requiredCollateral(position.committedLiquidity + pendingAdd, ratio),
                this.strategy.requiredCollateral(this.lpExposure(lp), ratio)
            );
            if (position.collateral - amount < required) {
                throw new ConsistencyError('InsufficientCollateral', 'remaining collateral below the LP requirement', {
                    remaining: position.collateral - amount,
                    required,
                });
            }

            position.collateral -= amount;
            this.reserve.transfer(this.pool, lp, amount);
            logger.info(`[LP-LEDGER] reduceCollateral lp=${lp} amount=${this.fmt(amount)}`);
        });
    }

    deposit(lp: string, amount: bigint): void {
        this.tx.run('lpDeposit', lp, () => {
            requireNotHalted(this.book, 'deposit');
            requirePositive(amount);
            const position = this.requireLp(lp);
            this.reserve.transferFrom(this.pool, lp, this.pool, amount);
            position.float += amount;
            logger.info(`[LP-LEDGER] float deposit lp=${lp} amount=${this.fmt(amount)} float=${this.fmt(position.float)}`);
        });
    }

    withdraw(lp: string, amount: bigint): void {
        this.tx.run('lpWithdraw', lp, () => {
            requirePositive(amount);
            const position = this.requireLp(lp);
            if (this.book.poolState() === PoolState.REBALANCING_ONCHAIN
                && this.book.current().activeLps.includes(lp)
                && this.book.settledFlow(lp) === undefined) {
                throw new StateError('SettlementPending', 'float is locked until the LP settles this cycle', { lp });
            }
            if (amount > position.float) {
                throw new ConsistencyError('InsufficientBalance', 'amount exceeds settlement float', {
                    amount,
                    float: position.float,
                });
            }
            position.float -= amount;
            this.reserve.transfer(this.pool, lp, amount);
            logger.info(`[LP-LEDGER] float withdraw lp=${lp} amount=${this.fmt(amount)} float=${this.fmt(position.float)}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REQUESTS
    // ═══════════════════════════════════════════════════════════════════════════

    addLiquidity(lp: string, amount: bigint): LpRequest {
        return this.tx.run('addLiquidity', lp, () => {
            this.requireLpPrincipal(lp);
            requirePoolState(this.book, 'addLiquidity', PoolState.ACTIVE);
            this.requireNoRequest(lp);
            requirePositive(amount);

            const position = this.register(lp);
            const required = this.strategy.requiredCollateral(
                position.committedLiquidity + amount,
                this.strategy.parameters.lpHealthyRatio
            );
            if (position.collateral < required) {
                throw new ConsistencyError('InsufficientCollateral', 'collateral below the LP requirement', {
                    collateral: position.collateral,
                    required,
                });
            }

            const request = this.queue(lp, LpRequestKind.ADD, amount, 0n, null);
            this.state.pendingAdds += amount;
            logger.info(`[LP-LEDGER] addLiquidity lp=${lp} amount=${this.fmt(amount)} cycle=${request.cycle}`);
            return { ...request };
        });
    }

    reduceLiquidity(lp: string, amount: bigint): LpRequest {
        return this.tx.run('reduceLiquidity', lp, () => {
            requirePoolState(this.book, 'reduceLiquidity', PoolState.ACTIVE);
            const position = this.requireLp(lp);
            this.requireNoRequest(lp);
            requirePositive(amount);
            if (amount > position.committedLiquidity) {
                throw new ConsistencyError('InsufficientLiquidity', 'amount exceeds committed liquidity', {
                    amount,
                    committed: position.committedLiquidity,
                });
            }

            const available = this.strategy.availableLiquidity({
                totalCommitted: this.state.totalCommitted,
                pendingAdds: this.state.pendingAdds,
                pendingReductions: this.state.pendingReductions,
                utilized: this.book.outstandingValue() + this.book.current().totalDeposits,
            });
            if (available < amount) {
                throw new ConsistencyError('InsufficientLiquidity', 'liquidity is in use by outstanding positions', {
                    amount,
                    available,
                });
            }

            const request = this.queue(lp, LpRequestKind.REDUCE, amount, 0n, null);
            this.state.pendingReductions += amount;
            logger.info(`[LP-LEDGER] reduceLiquidity lp=${lp} amount=${this.fmt(amount)} cycle=${request.cycle}`);
            return { ...request };
        });
    }

    liquidateLP(liquidator: string, target: string, amount: bigint): LpRequest {
        return this.tx.run('liquidateLP', liquidator, () => {
            this.requireLpPrincipal(liquidator);
            requirePoolState(this.book, 'liquidateLP', PoolState.ACTIVE);
            if (liquidator === target) {
                throw new ValidationError('SelfLiquidation', 'an LP cannot liquidate itself');
            }
            this.requireNoRequest(liquidator);
            requirePositive(amount);

            const position = this.state.lps.get(target);
            if (!position || position.committedLiquidity === 0n) {
                throw new NotFoundError('NotActiveLP', `${target} has no committed liquidity`, { target });
            }
            if (this.lpHealth(target) !== HealthTier.Liquidatable) {
                throw new ConsistencyError('NotLiquidatable', `${target} is not liquidatable`, { target });
            }
            if (amount * BPS > position.committedLiquidity * POOL_LIMITS.MAX_LIQUIDATION_BPS) {
                throw new ValidationError('ExcessiveAmount', 'liquidation above 30% of committed liquidity', {
                    amount,
                    committed: position.committedLiquidity,
                });
            }

            const currentCycle = this.book.currentCycle();
            const existing = this.state.liquidations.get(target);
            if (existing) {
                if (existing.cycle < currentCycle) {
                    throw new StateError('LiquidationPendingClaim', 'a settled liquidation on the target is unapplied', {
                        target,
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
                    `[LIQUIDATION] lp replaced target=${target} previous=${existing.liquidator} by=${liquidator} ` +
                    `amount=${this.fmt(existing.amount)}->${this.fmt(amount)}`
                );
            }

            const escrow = this.strategy.requiredCollateral(amount, this.strategy.parameters.lpHealthyRatio);
            this.reserve.transferFrom(this.pool, liquidator, this.pool, escrow);

            const request = this.queue(liquidator, LpRequestKind.LIQUIDATE, amount, escrow, target);
            this.state.liquidations.set(target, { liquidator, amount, cycle: currentCycle });
            logger.info(
                `[LIQUIDATION] lp target=${target} liquidator=${liquidator} amount=${this.fmt(amount)} ` +
                `escrow=${this.fmt(escrow)} cycle=${currentCycle}`
            );
            return { ...request };
        });
    }

    cancelRequest(lp: string): void {
        this.tx.run('lpCancelRequest', lp, () => {
            const request = this.state.requests.get(lp);
            if (!request) {
                throw new NotFoundError('NoPendingRequest', `no pending request for ${lp}`, { lp });
            }
            const state = this.book.poolState();
            if (request.cycle !== this.book.currentCycle()
                || (state !== PoolState.ACTIVE && state !== PoolState.HALTED)) {
                throw new StateError('RequestAlreadyProcessing', 'request is already being settled', {
                    cycle: request.cycle,
                    state,
                });
            }
            this.dropRequest(lp, request);
            logger.info(`[LP-LEDGER] cancel lp=${lp} kind=${request.kind} cycle=${request.cycle}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PAYOUTS
    // ═══════════════════════════════════════════════════════════════════════════

    claimInterest(lp: string): bigint {
        return this.tx.run('claimInterest', lp, () => {
            const position = this.requireLp(lp);
            const amount = position.accruedInterest;
            if (amount === 0n) {
                throw new NotFoundError('NothingToClaim', `no interest accrued for ${lp}`, { lp });
            }
            position.accruedInterest = 0n;
            this.reserve.transfer(this.pool, lp, amount);
            logger.info(`[LP-LEDGER] claimInterest lp=${lp} amount=${this.fmt(amount)}`);
            return amount;
        });
    }

    exitPool(lp: string): bigint {
        return this.tx.run('lpExitPool', lp, () => this.exit(lp, 'exit'));
    }

    removeLP(admin: string, lp: string): bigint {
        return this.tx.run('removeLP', admin, () => {
            this.capabilities.requireAdmin(admin);
            return this.exit(lp, `removed by ${admin}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SETTLEMENT HOOKS (orchestrator, inside its transactor scope)
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Apply the ADD / REDUCE / LIQUIDATE requests queued in `cycle`.
     * Liquidity changes go first so a liquidation moves what is left.
     */
    applyCycleRequests(cycle: number): void {
        this.requireScope('applyCycleRequests');
        const due = [...this.state.requests.entries()].filter(([, r]) => r.cycle === cycle);

        for (const [lp, request] of due) {
            if (request.kind === LpRequestKind.ADD) {
                const position = this.requireLp(lp);
                position.committedLiquidity += request.amount;
                this.state.totalCommitted += request.amount;
                this.state.pendingAdds -= request.amount;
                this.state.requests.delete(lp);
            } else if (request.kind === LpRequestKind.REDUCE) {
                const position = this.requireLp(lp);
                const reduced = minBig(request.amount, position.committedLiquidity);
                position.committedLiquidity -= reduced;
                this.state.totalCommitted -= reduced;
                this.state.pendingReductions -= request.amount;
                this.state.requests.delete(lp);
            }
        }

        for (const [liquidator, request] of due) {
            if (request.kind === LpRequestKind.LIQUIDATE) {
                this.applyLiquidation(liquidator, request);
            }
        }

        const check = this.checkInvariants();
        if (!check.valid) {
            logger.error(`[LP-LEDGER-ERROR] invariant violation after cycle ${cycle}: ${check.errors.join('; ')}`);
            throw new ConsistencyError('LedgerInvariant', check.errors.join('; '), { cycle });
        }
    }

    /**
     * Move an LP's settlement flow. Contributions come from float first,
     * then from the LP wallet (needs an allowance to the pool).
     */
    settleFlow(lp: string, flow: bigint, cycle: number): FlowSettlement {
        this.requireScope('settleFlow');
        const position = this.requireLp(lp);
        const result: FlowSettlement = { fromFloat: 0n, fromWallet: 0n, fromCollateral: 0n, paid: 0n };

        if (flow > 0n) {
            this.reserve.transfer(this.pool, lp, flow);
            result.paid = flow;
        } else if (flow < 0n) {
            const owed = -flow;
            result.fromFloat = minBig(position.float, owed);
            position.float -= result.fromFloat;
            result.fromWallet = owed - result.fromFloat;
            if (result.fromWallet > 0n) {
                this.reserve.transferFrom(this.pool, lp, this.pool, result.fromWallet);
            }
        }
        position.lastRebalancedCycle = cycle;
        return result;
    }

    /**
     * Forced settlement from float then collateral. Returns null when the
     * LP cannot cover its contribution.
     */
    forceSettle(lp: string, flow: bigint, cycle: number): FlowSettlement | null {
        this.requireScope('forceSettle');
        const position = this.requireLp(lp);
        if (flow >= 0n) {
            return this.settleFlow(lp, flow, cycle);
        }

        const owed = -flow;
        if (position.float + position.collateral < owed) {
            return null;
        }
        const fromFloat = minBig(position.float, owed);
        position.float -= fromFloat;
        position.collateral -= owed - fromFloat;
        position.lastRebalancedCycle = cycle;
        return { fromFloat, fromWallet: 0n, fromCollateral: owed - fromFloat, paid: 0n };
    }

    /**
     * Undo a settlement of a cycle that will never finalize. Paid flows are
     * recovered from collateral; contributions return as float. Returns the
     * part of a paid flow collateral could not cover.
     */
    reverseSettlement(lp: string, flow: bigint): bigint {
        this.requireScope('reverseSettlement');
        const position = this.requireLp(lp);
        if (flow > 0n) {
            const recovered = minBig(position.collateral, flow);
            position.collateral -= recovered;
            return flow - recovered;
        }
        position.float += -flow;
        return 0n;
    }

    creditInterest(lp: string, amount: bigint): void {
        this.requireScope('creditInterest');
        this.requireLp(lp).accruedInterest += amount;
    }

    /**
     * Move each LP's share of `settledValue` (capped by its collateral) into
     * the halt exit reserve. Returns the reserve total.
     */
    seizeExitReserve(settledValue: bigint): bigint {
        this.requireScope('seizeExitReserve');
        let reserve = 0n;
        if (this.state.totalCommitted === 0n) {
            return reserve;
        }
        for (const [lp, position] of this.state.lps) {
            if (position.committedLiquidity === 0n) continue;
            const share = mulDiv(settledValue, position.committedLiquidity, this.state.totalCommitted);
            const backing = minBig(position.collateral, share);
            position.collateral -= backing;
            reserve += backing;
            logger.warn(`[HALT] lp backing lp=${lp} share=${this.fmt(share)} seized=${this.fmt(backing)}`);
        }
        return reserve;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private exit(lp: string, reason: string): bigint {
        const position = this.requireLp(lp);
        const halted = this.book.poolState() === PoolState.HALTED;

        if (!halted) {
            if (position.committedLiquidity > 0n) {
                throw new StateError('LiquidityCommitted', 'reduce committed liquidity to zero before exiting', {
                    lp,
                    committed: position.committedLiquidity,
                });
            }
            this.requireNoRequest(lp);
        } else {
            const request = this.state.requests.get(lp);
            if (request) {
                this.dropRequest(lp, request);
            }
            this.state.totalCommitted -= position.committedLiquidity;
            position.committedLiquidity = 0n;
        }

        const payout = position.collateral + position.float + position.accruedInterest;
        this.state.lps.delete(lp);
        if (payout > 0n) {
            this.reserve.transfer(this.pool, lp, payout);
        }
        logger.info(`[LP-LEDGER] exit lp=${lp} payout=${this.fmt(payout)} reason=${reason}`);
        return payout;
    }

    private applyLiquidation(liquidator: string, request: LpRequest): void {
        const target = request.target;
        if (target === null) {
            throw new ConsistencyError('CorruptRequest', 'LP liquidation without a target', { liquidator });
        }
        const victim = this.state.lps.get(target);
        const committedBefore = victim?.committedLiquidity ?? 0n;
        const moved = minBig(request.amount, committedBefore);
        const receiver = this.register(liquidator);

        let reward = 0n;
        if (victim && moved > 0n) {
            reward = this.strategy.lpLiquidationReward(victim.collateral, moved, committedBefore);
            victim.committedLiquidity -= moved;
            victim.collateral -= reward;
            receiver.committedLiquidity += moved;
        }
        receiver.collateral += request.collateral + reward;

        this.state.requests.delete(liquidator);
        this.state.liquidations.delete(target);
        logger.info(
            `[LIQUIDATION] lp applied target=${target} liquidator=${liquidator} ` +
            `moved=${this.fmt(moved)} reward=${this.fmt(reward)}`
        );
    }

    private queue(
        lp: string,
        kind: LpRequestKind,
        amount: bigint,
        collateral: bigint,
        target: string | null
    ): LpRequest {
        const idKind = kind === LpRequestKind.ADD ? 'add' : kind === LpRequestKind.REDUCE ? 'red-lp' : 'liq-lp';
        const request: LpRequest = {
            id: generateRequestId(idKind),
            kind,
            amount,
            collateral,
            target,
            cycle: this.book.currentCycle(),
        };
        this.state.requests.set(lp, request);
        return request;
    }

    private dropRequest(lp: string, request: LpRequest): void {
        switch (request.kind) {
            case LpRequestKind.ADD:
                this.state.pendingAdds -= request.amount;
                this.state.requests.delete(lp);
                break;
            case LpRequestKind.REDUCE:
                this.state.pendingReductions -= request.amount;
                this.state.requests.delete(lp);
                break;
            case LpRequestKind.LIQUIDATE:
                this.refundLiquidation(lp);
                break;
            case LpRequestKind.NONE:
                throw new ConsistencyError('CorruptRequest', 'stored request has kind NONE', { lp });
        }
    }

    private refundLiquidation(liquidator: string): void {
        const request = this.state.requests.get(liquidator);
        if (!request || request.kind !== LpRequestKind.LIQUIDATE || request.target === null) {
            throw new ConsistencyError('CorruptRequest', 'liquidation claim without its request', { liquidator });
        }
        this.reserve.transfer(this.pool, liquidator, request.collateral);
        this.state.requests.delete(liquidator);
        this.state.liquidations.delete(request.target);
    }

    private register(lp: string): LpPosition {
        const existing = this.state.lps.get(lp);
        if (existing) {
            return existing;
        }
        const position: LpPosition = {
            committedLiquidity: 0n,
            collateral: 0n,
            float: 0n,
            accruedInterest: 0n,
            lastRebalancedCycle: null,
            registeredAt: this.clock.now(),
        };
        this.state.lps.set(lp, position);
        logger.info(`[LP-LEDGER] registered lp=${lp}`);
        return position;
    }

    private requireLp(lp: string): LpPosition {
        const position = this.state.lps.get(lp);
        if (!position) {
            throw new NotFoundError('NotRegistered', `${lp} is not a registered LP`, { lp });
        }
        return position;
    }

    private requireLpPrincipal(lp: string): void {
        requirePrincipal(lp, 'lp');
        if (lp === this.pool) {
            throw new ValidationError('InvalidAddress', 'pool custody cannot act as an LP');
        }
    }

    private requireNoRequest(lp: string): void {
        const pending = this.state.requests.get(lp);
        if (pending) {
            throw new StateError('RequestPending', `${lp} already has a pending ${pending.kind} request`, {
                lp,
                kind: pending.kind,
                cycle: pending.cycle,
            });
        }
    }

    private requireScope(hook: string): void {
        if (!this.tx.inScope) {
            throw new Error(`[LP-LEDGER] ${hook} must run inside a transactor scope`);
        }
    }

    private fmt(amount: bigint): string {
        return formatUnits(amount, this.reserve.decimals);
    }
}
