/**
 * Cycle Orchestrator — Rebalance State Machine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 *   ACTIVE ──initiateOffchainRebalance──▶ REBALANCING_OFFCHAIN
 *          ◀──────── finalize ─────────┐          │
 *                                      │  initiateOnchainRebalance
 *                                      │          ▼
 *                                REBALANCING_ONCHAIN ──forceRebalanceLP──▶ HALTED
 *
 * OFFCHAIN: market open; interest index snapshotted; LPs trade the net
 *           exposure off-pool.
 * ONCHAIN:  market closed; one settlement price is fixed; every active LP
 *           settles its pro-rata share of
 *
 *             netFlow = deposits - reserveFromAsset(redemptionShares, P)
 *
 *           (positive pays LPs, negative is owed by LPs). The last settler
 *           absorbs rounding dust so Σ flows === netFlow.
 *
 * Once every active LP has settled: LP interest is credited, LP requests
 * apply, settled totals move and the next cycle opens.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS, PRECISION, SECONDS_PER_YEAR } from '../config/constants';
import { CycleParameters } from '../config/parameters';
import {
    ConsistencyError,
    NotFoundError,
    StalenessError,
    StateError,
    ValidationError,
    requirePrincipal,
} from '../core/errors';
import { AssetOracle } from '../oracle/types';
import { InterestSplit, PoolStrategy } from '../policy/types';
import { CapabilityService } from '../registry/capabilities';
import { Transactor } from '../state/transactor';
import { CycleTelemetry } from '../telemetry/cycleTelemetry';
import { ReserveToken, SyntheticToken } from '../tokens/types';
import { Clock } from '../utils/clock';
import logger from '../utils/logger';
import { formatBps, formatPrice, formatUnits, mulDiv, withinTolerance } from '../utils/math';
import { PriceConverter, proRata, sharesToAmount } from './conversion';
import { CycleBook } from './cycleBook';
import { requirePoolState } from './guards';
import { FlowSettlement, LPLedger } from './lpLedger';
import { CycleRecord, DeviationStatus, HaltSnapshot, LpObligation, PoolState } from './types';

/** Synthetic owed to the depositors of a settled cycle */
export interface DepositShares {
    depositSharesDue(cycle: Readonly<CycleRecord>): bigint;
}

export interface CycleOrchestratorDeps {
    poolAccount: string;
    book: CycleBook;
    lps: LPLedger;
    users: DepositShares;
    strategy: PoolStrategy;
    oracle: AssetOracle;
    synthetic: SyntheticToken;
    reserve: ReserveToken;
    converter: PriceConverter;
    capabilities: CapabilityService;
    clock: Clock;
    cycle: CycleParameters;
    telemetry: CycleTelemetry;
    transactor: Transactor;
}

export interface RebalanceResult {
    obligation: LpObligation;
    settlement: FlowSettlement;
    finalized: boolean;
}

export type ForceRebalanceResult =
    | { outcome: 'SETTLED'; obligation: LpObligation; settlement: FlowSettlement; finalized: boolean }
    | { outcome: 'HALTED'; obligation: LpObligation; halt: HaltSnapshot };

export class CycleOrchestrator {
    private readonly pool: string;
    private readonly book: CycleBook;
    private readonly lps: LPLedger;
    private readonly users: DepositShares;
    private readonly strategy: PoolStrategy;
    private readonly oracle: AssetOracle;
    private readonly synthetic: SyntheticToken;
    private readonly reserve: ReserveToken;
    private readonly converter: PriceConverter;
    private readonly capabilities: CapabilityService;
    private readonly clock: Clock;
    private readonly params: CycleParameters;
    private readonly telemetry: CycleTelemetry;
    private readonly tx: Transactor;

    constructor(deps: CycleOrchestratorDeps) {
        this.pool = deps.poolAccount;
        this.book = deps.book;
        this.lps = deps.lps;
        this.users = deps.users;
        this.strategy = deps.strategy;
        this.oracle = deps.oracle;
        this.synthetic = deps.synthetic;
        this.reserve = deps.reserve;
        this.converter = deps.converter;
        this.capabilities = deps.capabilities;
        this.clock = deps.clock;
        this.params = deps.cycle;
        this.telemetry = deps.telemetry;
        this.tx = deps.transactor;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getState(): PoolState {
        return this.book.poolState();
    }

    currentCycle(): number {
        return this.book.currentCycle();
    }

    getCycle(index: number): CycleRecord {
        return this.book.getCycle(index);
    }

    cumulativeIndex(): bigint {
        return this.book.cumulativeIndex();
    }

    utilization(): bigint {
        return this.strategy.utilization(this.book.outstandingValue(), this.lps.totalCommitted());
    }

    currentRate(): bigint {
        return this.strategy.interestRate(this.utilization());
    }

    haltSnapshot(): HaltSnapshot | null {
        return this.book.haltSnapshot();
    }

    protocolFees(): bigint {
        return this.book.protocolFees();
    }

    /**
     * Deviation of the current cycle. DETECTED is reported while the oracle
     * price is outside tolerance of the last settlement price and no admin
     * decision has been recorded.
     */
    priceDeviation(): DeviationStatus {
        const cycle = this.book.current();
        if (cycle.deviation !== 'NONE') {
            return cycle.deviation;
        }
        return this.deviates(this.oracle.currentPrice()) ? 'DETECTED' : 'NONE';
    }

    /**
     * The settlement an active LP owes (or is owed) in the onchain phase.
     */
    lpObligation(lp: string): LpObligation {
        requirePoolState(this.book, 'lpObligation', PoolState.REBALANCING_ONCHAIN);
        const cycle = this.book.current();
        if (!cycle.activeLps.includes(lp)) {
            throw new StateError('NotActiveLP', `${lp} is not part of cycle ${cycle.index}`, { lp });
        }

        const unsettled = cycle.activeLps.filter(a => this.book.settledFlow(a) === undefined);
        const flow = unsettled.length === 1 && unsettled[0] === lp
            ? cycle.netFlow - this.book.totalSettledFlow()
            : proRata(cycle.netFlow, this.lps.committedOf(lp), cycle.totalCommitted);

        return {
            lp,
            flow,
            isContribution: flow < 0n,
            amount: flow < 0n ? -flow : flow,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PHASE TRANSITIONS
    // ═══════════════════════════════════════════════════════════════════════════

    initiateOffchainRebalance(caller: string = 'keeper'): CycleRecord {
        return this.tx.run('initiateOffchainRebalance', caller, () => {
            requirePoolState(this.book, 'initiateOffchainRebalance', PoolState.ACTIVE);
            const now = this.clock.now();
            const cycle = this.book.mutableCurrent();

            const opensAt = cycle.startedAt + this.params.cycleLength;
            if (now < opensAt) {
                throw new StateError('CycleInProgress', `cycle ${cycle.index} runs until ${opensAt}`, {
                    now,
                    opensAt,
                });
            }
            if (!this.oracle.isMarketOpen()) {
                throw new StateError('MarketClosed', 'offchain rebalance needs an open market');
            }

            this.snapshotInterest(cycle, now);
            cycle.offchainStartedAt = now;
            cycle.state = 'SETTLING';
            this.book.setPoolState(PoolState.REBALANCING_OFFCHAIN);

            logger.info(
                `[CYCLE] offchain cycle=${cycle.index} deposits=${this.fmt(cycle.totalDeposits)} ` +
                `redemptionShares=${cycle.totalRedemptionShares} util=${formatBps(cycle.utilization)} ` +
                `rate=${formatBps(cycle.interestRate)} interest=${this.fmt(cycle.interestAccrued)}`
            );
            return structuredClone(cycle);
        });
    }

    initiateOnchainRebalance(caller: string = 'keeper'): CycleRecord {
        return this.tx.run('initiateOnchainRebalance', caller, () => {
            requirePoolState(this.book, 'initiateOnchainRebalance', PoolState.REBALANCING_OFFCHAIN);
            const now = this.clock.now();
            const cycle = this.book.mutableCurrent();
            const offchainStart = cycle.offchainStartedAt;
            if (offchainStart === null) {
                throw new ConsistencyError('CorruptCycle', 'offchain phase without a start time', { cycle: cycle.index });
            }

            const opensAt = offchainStart + this.params.rebalanceLength;
            if (now < opensAt) {
                throw new StateError('RebalancePeriodActive', `offchain phase runs until ${opensAt}`, { now, opensAt });
            }
            if (this.oracle.isMarketOpen()) {
                throw new StateError('MarketOpen', 'onchain rebalance needs a closed market');
            }
            const updated = this.oracle.lastUpdateTimestamp();
            if (updated < offchainStart || now - updated > this.params.oracleMaxAge) {
                throw new StalenessError('OracleStale', `${this.oracle.symbol} price is stale`, {
                    updated,
                    offchainStart,
                    now,
                });
            }
            const price = this.oracle.currentPrice();
            if (price <= 0n) {
                throw new StalenessError('OracleStale', `${this.oracle.symbol} has no price`);
            }
            if (cycle.deviation === 'NONE' && this.deviates(price)) {
                throw new StalenessError('PriceDeviationHigh', 'settlement price deviates from the last cycle', {
                    price,
                    previous: this.book.lastSettlementPrice(),
                    toleranceBps: this.params.priceDeviationToleranceBps,
                });
            }

            cycle.settlementPrice = price;
            cycle.splitMultiplier = this.synthetic.splitMultiplier();
            cycle.onchainStartedAt = now;
            cycle.activeLps = this.lps.activeLps();
            cycle.totalCommitted = this.lps.totalCommitted();

            const redemptionValue = cycle.totalRedemptionShares === 0n
                ? 0n
                : this.converter.reserveFromAsset(sharesToAmount(cycle.totalRedemptionShares, cycle.splitMultiplier), price);
            cycle.netFlow = cycle.totalDeposits - redemptionValue;
            this.book.setPoolState(PoolState.REBALANCING_ONCHAIN);

            logger.info(
                `[CYCLE] onchain cycle=${cycle.index} price=${formatPrice(price)} netFlow=${this.fmt(cycle.netFlow)} ` +
                `lps=${cycle.activeLps.length} committed=${this.fmt(cycle.totalCommitted)}`
            );

            if (cycle.activeLps.length === 0) {
                if (cycle.netFlow === 0n) {
                    this.finalize(now);
                } else {
                    // nobody can settle this flow; freeze so requests can be cancelled
                    this.halt(`no active LP to settle ${this.fmt(cycle.netFlow)} in cycle ${cycle.index}`, now);
                }
            }
            return this.book.getCycle(cycle.index);
        });
    }

    resolvePriceDeviation(admin: string, isSplit: boolean, ratioNum: bigint, ratioDen: bigint): DeviationStatus {
        return this.tx.run('resolvePriceDeviation', admin, () => {
            this.capabilities.requireAdmin(admin);
            requirePoolState(this.book, 'resolvePriceDeviation', PoolState.REBALANCING_OFFCHAIN);
            const cycle = this.book.mutableCurrent();
            const price = this.oracle.currentPrice();
            if (cycle.deviation !== 'NONE' || !this.deviates(price)) {
                throw new StateError('NoPriceDeviation', 'no unresolved price deviation this cycle', {
                    price,
                    previous: this.book.lastSettlementPrice(),
                });
            }

            if (isSplit) {
                if (ratioNum <= 0n || ratioDen <= 0n
                    || !this.oracle.splitDetected()
                    || !this.oracle.verifySplit(ratioNum, ratioDen)) {
                    throw new ValidationError('InvalidSplit', `split ${ratioNum}:${ratioDen} does not match the oracle`, {
                        ratioNum,
                        ratioDen,
                        splitDetected: this.oracle.splitDetected(),
                    });
                }
                const previous = this.book.lastSettlementPrice();
                this.synthetic.applySplit(ratioNum, ratioDen);
                this.book.rescaleLastSettlementPrice(ratioNum, ratioDen);
                cycle.deviation = 'SPLIT';
                cycle.splitRatio = { num: ratioNum, den: ratioDen };
                logger.warn(
                    `[SPLIT] cycle=${cycle.index} ratio=${ratioNum}:${ratioDen} admin=${admin} ` +
                    `lastPrice=${formatPrice(previous)}->${formatPrice(this.book.lastSettlementPrice())}`
                );
            } else {
                cycle.deviation = 'ACCEPTED';
                logger.warn(
                    `[CYCLE] deviation accepted cycle=${cycle.index} admin=${admin} ` +
                    `price=${formatPrice(this.book.lastSettlementPrice())}->${formatPrice(price)}`
                );
            }

            this.oracle.clearSplit();
            return cycle.deviation;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LP SETTLEMENT
    // ═══════════════════════════════════════════════════════════════════════════

    rebalancePool(lp: string, price: bigint, amount?: bigint, isContribution?: boolean): RebalanceResult {
        return this.tx.run('rebalancePool', lp, () => {
            requirePoolState(this.book, 'rebalancePool', PoolState.REBALANCING_ONCHAIN);
            const cycle = this.book.current();
            this.requireUnsettled(lp, cycle);
            if (!withinTolerance(price, cycle.settlementPrice, this.params.priceDeviationToleranceBps)) {
                throw new StalenessError('PriceDeviationHigh', 'LP price is outside tolerance of the settlement price', {
                    price,
                    settlementPrice: cycle.settlementPrice,
                });
            }

            const obligation = this.lpObligation(lp);
            const amountMismatch = amount !== undefined && amount !== obligation.amount;
            const directionMismatch = isContribution !== undefined
                && obligation.amount > 0n
                && isContribution !== obligation.isContribution;
            if (amountMismatch || directionMismatch) {
                throw new ValidationError('RebalanceMismatch', 'declared settlement does not match the obligation', {
                    amount: amount ?? null,
                    isContribution: isContribution ?? null,
                    expectedAmount: obligation.amount,
                    expectedContribution: obligation.isContribution,
                });
            }

            const settlement = this.lps.settleFlow(lp, obligation.flow, cycle.index);
            this.book.markSettled(lp, obligation.flow);
            logger.info(
                `[CYCLE] settled cycle=${cycle.index} lp=${lp} flow=${this.fmt(obligation.flow)} ` +
                `float=${this.fmt(settlement.fromFloat)} wallet=${this.fmt(settlement.fromWallet)}`
            );

            const finalized = this.finalizeIfComplete();
            return { obligation, settlement, finalized };
        });
    }

    forceRebalanceLP(admin: string, lp: string): ForceRebalanceResult {
        return this.tx.run('forceRebalanceLP', admin, () => {
            this.capabilities.requireAdmin(admin);
            requirePoolState(this.book, 'forceRebalanceLP', PoolState.REBALANCING_ONCHAIN);
            const now = this.clock.now();
            const cycle = this.book.current();
            const onchainStart = cycle.onchainStartedAt ?? now;
            const forcibleAt = onchainStart + this.params.haltThreshold;
            if (now < forcibleAt) {
                throw new StateError('HaltThresholdNotReached', `LPs may settle until ${forcibleAt}`, {
                    now,
                    forcibleAt,
                });
            }
            this.requireUnsettled(lp, cycle);

            const obligation = this.lpObligation(lp);
            const settlement = this.lps.forceSettle(lp, obligation.flow, cycle.index);
            if (settlement === null) {
                const halt = this.halt(
                    `lp ${lp} could not cover ${this.fmt(obligation.amount)} in cycle ${cycle.index}`,
                    now
                );
                return { outcome: 'HALTED', obligation, halt };
            }

            this.book.markSettled(lp, obligation.flow);
            this.telemetry.noteForcedSettlement(cycle.index);
            logger.warn(
                `[CYCLE] forced cycle=${cycle.index} lp=${lp} flow=${this.fmt(obligation.flow)} ` +
                `float=${this.fmt(settlement.fromFloat)} collateral=${this.fmt(settlement.fromCollateral)} admin=${admin}`
            );
            const finalized = this.finalizeIfComplete();
            return { outcome: 'SETTLED', obligation, settlement, finalized };
        });
    }

    claimProtocolFees(admin: string, to: string): bigint {
        return this.tx.run('claimProtocolFees', admin, () => {
            this.capabilities.requireAdmin(admin);
            requirePrincipal(to, 'to');
            const fees = this.book.takeProtocolFees();
            if (fees === 0n) {
                throw new NotFoundError('NothingToClaim', 'no protocol fees accrued');
            }
            this.reserve.transfer(this.pool, to, fees);
            logger.info(`[CYCLE] protocol fees paid to=${to} amount=${this.fmt(fees)} admin=${admin}`);
            return fees;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * index += index * rate * Δt / (BPS * YEAR); the cycle's interest is the
     * outstanding principal times the index delta.
     */
    private snapshotInterest(cycle: CycleRecord, now: number): void {
        const utilization = this.utilization();
        const rate = this.strategy.interestRate(utilization);
        const elapsed = BigInt(Math.max(0, now - this.book.lastIndexUpdate()));
        const previous = this.book.cumulativeIndex();
        const next = previous + (previous * rate * elapsed) / (BPS * SECONDS_PER_YEAR);

        this.book.advanceIndex(next, now);
        cycle.interestIndex = next;
        cycle.utilization = utilization;
        cycle.interestRate = rate;
        cycle.interestAccrued = mulDiv(this.book.outstandingPrincipal(), next - previous, PRECISION);
    }

    private deviates(price: bigint): boolean {
        const previous = this.book.lastSettlementPrice();
        if (previous === 0n) {
            return false;
        }
        return !withinTolerance(price, previous, this.params.priceDeviationToleranceBps);
    }

    private requireUnsettled(lp: string, cycle: Readonly<CycleRecord>): void {
        if (!cycle.activeLps.includes(lp)) {
            throw new StateError('NotActiveLP', `${lp} is not part of cycle ${cycle.index}`, { lp });
        }
        if (this.book.settledFlow(lp) !== undefined) {
            throw new StateError('AlreadySettled', `${lp} already settled cycle ${cycle.index}`, { lp });
        }
    }

    private finalizeIfComplete(): boolean {
        const cycle = this.book.current();
        if (cycle.settledLpCount < cycle.activeLps.length) {
            return false;
        }
        this.finalize(this.clock.now());
        return true;
    }

    private finalize(now: number): void {
        const cycle = this.book.current();

        const { lpShare, protocolFee } = this.distributeInterest(cycle);

        this.lps.applyCycleRequests(cycle.index);

        const minted = this.users.depositSharesDue(cycle);
        const settled = this.book.finalizeCurrent(minted, now);

        this.telemetry.recordCycle({
            cycle: settled.index,
            settledAt: now,
            price: settled.settlementPrice,
            netFlow: settled.netFlow,
            deposits: settled.totalDeposits,
            interestAccrued: settled.interestAccrued,
            protocolFee,
            lpCount: settled.activeLps.length,
            offchainSeconds: (settled.onchainStartedAt ?? now) - (settled.offchainStartedAt ?? now),
            settlementSeconds: now - (settled.onchainStartedAt ?? now),
        });

        logger.info(
            `[CYCLE] finalized cycle=${settled.index} price=${formatPrice(settled.settlementPrice)} ` +
            `netFlow=${this.fmt(settled.netFlow)} lpInterest=${this.fmt(lpShare)} fee=${this.fmt(protocolFee)} ` +
            `next=${this.book.currentCycle()}`
        );
    }

    /**
     * Credit the cycle's accrued interest to its LPs by committed liquidity;
     * the protocol fee and any rounding remainder go to protocol fees.
     */
    private distributeInterest(cycle: Readonly<CycleRecord>): InterestSplit {
        const split = this.strategy.splitInterest(cycle.interestAccrued);
        let undistributed = split.lpShare;
        cycle.activeLps.forEach((lp, i) => {
            const isLast = i === cycle.activeLps.length - 1;
            const credit = isLast
                ? undistributed
                : mulDiv(split.lpShare, this.lps.committedOf(lp), cycle.totalCommitted);
            this.lps.creditInterest(lp, credit);
            undistributed -= credit;
        });
        this.book.accrueProtocolFee(split.protocolFee + undistributed);
        return split;
    }

    /**
     * Freeze the pool: undo this cycle's partial settlements, then move each
     * LP's share of the settled value (capped by its collateral) into the
     * exit reserve that HALTED exits draw from.
     */
    private halt(reason: string, now: number): HaltSnapshot {
        for (const [lp, flow] of this.book.settledFlows()) {
            const shortfall = this.lps.reverseSettlement(lp, flow);
            if (shortfall > 0n) {
                logger.error(`[HALT] lp=${lp} could not return ${this.fmt(shortfall)} of its settlement`);
            }
        }

        const cycle = this.book.current();
        // users exiting pay interest up to this cycle's index
        const interest = this.distributeInterest(cycle);
        const price = cycle.settlementPrice > 0n ? cycle.settlementPrice : this.book.lastSettlementPrice();
        const settledValue = this.book.valueAt(price);
        const exitReserve = this.lps.seizeExitReserve(settledValue);

        const snapshot: HaltSnapshot = {
            haltedAt: now,
            cycle: cycle.index,
            reason,
            price,
            supplyShares: this.book.settledSupplyShares(),
            exitReserve,
            exitReservePaid: 0n,
        };
        this.book.recordHalt(snapshot);

        logger.error(
            `[HALT] pool halted cycle=${cycle.index} reason="${reason}" price=${formatPrice(price)} ` +
            `settledValue=${this.fmt(settledValue)} exitReserve=${this.fmt(exitReserve)} ` +
            `lpInterest=${this.fmt(interest.lpShare)} fee=${this.fmt(interest.protocolFee)}`
        );
        return { ...snapshot };
    }

    private fmt(amount: bigint): string {
        return formatUnits(amount, this.reserve.decimals);
    }
}
