/**
 * Cycle Book — Pool State, Cycle Records and the Interest Index
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The orchestrator owns every transition. The ledgers see the book through
 * CycleIntake: read-only views plus the intake totals of the open cycle
 * (deposits and redemptions queued by requests and cancels).
 *
 * INVARIANTS:
 *   1. Cycle records are created at genesis and on finalization, never deleted
 *   2. cumulativeIndex never decreases
 *   3. settledSupplyShares and outstandingPrincipal only move at finalization
 *      (and by HALTED exits)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PRECISION } from '../config/constants';
import { ConsistencyError, NotFoundError } from '../core/errors';
import { StatefulComponent } from '../state/transactor';
import { SyntheticToken } from '../tokens/types';
import { Clock } from '../utils/clock';
import { PriceConverter } from './conversion';
import { CycleRecord, HaltSnapshot, PoolState } from './types';

interface CycleBookState {
    poolState: PoolState;
    currentCycle: number;
    cycles: Map<number, CycleRecord>;

    cumulativeIndex: bigint;
    lastIndexUpdate: number;
    /** Price of the last settled cycle, rescaled on a split */
    lastSettlementPrice: bigint;

    settledSupplyShares: bigint;
    outstandingPrincipal: bigint;

    /** LP → signed flow already settled in the current onchain phase */
    settledFlows: Map<string, bigint>;

    protocolFees: bigint;
    halt: HaltSnapshot | null;
}

/**
 * Read-only view of the book.
 */
export interface CycleView {
    poolState(): PoolState;
    currentCycle(): number;
    current(): Readonly<CycleRecord>;
    getCycle(index: number): CycleRecord;
    cumulativeIndex(): bigint;
    lastSettlementPrice(): bigint;
    settledSupplyShares(): bigint;
    outstandingPrincipal(): bigint;
    /** Settled synthetic supply valued in reserve at the last settlement price */
    outstandingValue(): bigint;
    haltSnapshot(): HaltSnapshot | null;
    /** Flow an LP settled in the current onchain phase, if any */
    settledFlow(lp: string): bigint | undefined;
}

/**
 * What the ledgers may write: intake totals of the open cycle and exits.
 */
export interface CycleIntake extends CycleView {
    recordDeposit(delta: bigint): void;
    recordRedemption(sharesDelta: bigint, principalDelta: bigint): void;
    recordHaltExit(shares: bigint, principal: bigint, reservePaid: bigint): void;
}

function openCycle(index: number, startedAt: number): CycleRecord {
    return {
        index,
        state: 'OPEN',
        startedAt,
        offchainStartedAt: null,
        onchainStartedAt: null,
        settledAt: null,
        settlementPrice: 0n,
        splitMultiplier: 0n,
        totalDeposits: 0n,
        totalRedemptionShares: 0n,
        redemptionPrincipal: 0n,
        interestIndex: 0n,
        utilization: 0n,
        interestRate: 0n,
        interestAccrued: 0n,
        netFlow: 0n,
        activeLps: [],
        totalCommitted: 0n,
        settledLpCount: 0,
        deviation: 'NONE',
        splitRatio: null,
    };
}

export class CycleBook extends StatefulComponent<CycleBookState> implements CycleIntake {
    constructor(
        clock: Clock,
        private readonly token: SyntheticToken,
        private readonly converter: PriceConverter
    ) {
        const genesis = clock.now();
        super(`cycle-book:${token.symbol}`, {
            poolState: PoolState.ACTIVE,
            currentCycle: 0,
            cycles: new Map([[0, openCycle(0, genesis)]]),
            cumulativeIndex: PRECISION,
            lastIndexUpdate: genesis,
            lastSettlementPrice: 0n,
            settledSupplyShares: 0n,
            outstandingPrincipal: 0n,
            settledFlows: new Map(),
            protocolFees: 0n,
            halt: null,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    poolState(): PoolState {
        return this.state.poolState;
    }

    currentCycle(): number {
        return this.state.currentCycle;
    }

    current(): Readonly<CycleRecord> {
        return this.record(this.state.currentCycle);
    }

    getCycle(index: number): CycleRecord {
        return structuredClone(this.record(index));
    }

    cumulativeIndex(): bigint {
        return this.state.cumulativeIndex;
    }

    lastIndexUpdate(): number {
        return this.state.lastIndexUpdate;
    }

    lastSettlementPrice(): bigint {
        return this.state.lastSettlementPrice;
    }

    settledSupplyShares(): bigint {
        return this.state.settledSupplyShares;
    }

    outstandingPrincipal(): bigint {
        return this.state.outstandingPrincipal;
    }

    outstandingValue(): bigint {
        return this.valueAt(this.state.lastSettlementPrice);
    }

    /** Settled supply valued at `price`, using the token's current multiplier */
    valueAt(price: bigint): bigint {
        if (price === 0n || this.state.settledSupplyShares === 0n) {
            return 0n;
        }
        return this.converter.reserveFromAsset(this.token.fromShares(this.state.settledSupplyShares), price);
    }

    haltSnapshot(): HaltSnapshot | null {
        return this.state.halt === null ? null : { ...this.state.halt };
    }

    protocolFees(): bigint {
        return this.state.protocolFees;
    }

    settledFlow(lp: string): bigint | undefined {
        return this.state.settledFlows.get(lp);
    }

    settledFlows(): Map<string, bigint> {
        return new Map(this.state.settledFlows);
    }

    totalSettledFlow(): bigint {
        let total = 0n;
        for (const flow of this.state.settledFlows.values()) {
            total += flow;
        }
        return total;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTAKE (ledgers)
    // ═══════════════════════════════════════════════════════════════════════════

    recordDeposit(delta: bigint): void {
        const cycle = this.mutableCurrent();
        cycle.totalDeposits += delta;
        if (cycle.totalDeposits < 0n) {
            throw new ConsistencyError('CycleTotalsNegative', 'deposit total would go negative', { delta });
        }
    }

    recordRedemption(sharesDelta: bigint, principalDelta: bigint): void {
        const cycle = this.mutableCurrent();
        cycle.totalRedemptionShares += sharesDelta;
        cycle.redemptionPrincipal += principalDelta;
        if (cycle.totalRedemptionShares < 0n || cycle.redemptionPrincipal < 0n) {
            throw new ConsistencyError('CycleTotalsNegative', 'redemption totals would go negative', {
                sharesDelta,
                principalDelta,
            });
        }
    }

    recordHaltExit(shares: bigint, principal: bigint, reservePaid: bigint): void {
        const halt = this.state.halt;
        if (halt === null) {
            throw new ConsistencyError('NotHalted', 'no halt snapshot to exit against');
        }
        halt.exitReservePaid += reservePaid;
        if (halt.exitReservePaid > halt.exitReserve) {
            throw new ConsistencyError('ExitReserveExceeded', 'exit payouts exceed the halt reserve', {
                exitReserve: halt.exitReserve,
                paid: halt.exitReservePaid,
            });
        }
        this.state.settledSupplyShares -= shares;
        this.state.outstandingPrincipal -= principal;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TRANSITIONS (orchestrator)
    // ═══════════════════════════════════════════════════════════════════════════

    mutableCurrent(): CycleRecord {
        return this.record(this.state.currentCycle);
    }

    setPoolState(next: PoolState): void {
        this.state.poolState = next;
    }

    advanceIndex(index: bigint, now: number): void {
        if (index < this.state.cumulativeIndex) {
            throw new ConsistencyError('IndexDecreased', 'cumulative index cannot decrease', {
                current: this.state.cumulativeIndex,
                next: index,
            });
        }
        this.state.cumulativeIndex = index;
        this.state.lastIndexUpdate = now;
    }

    /** After a split the last price is restated in post-split units */
    rescaleLastSettlementPrice(ratioNum: bigint, ratioDen: bigint): void {
        this.state.lastSettlementPrice = (this.state.lastSettlementPrice * ratioDen) / ratioNum;
    }

    markSettled(lp: string, flow: bigint): void {
        this.state.settledFlows.set(lp, flow);
        this.mutableCurrent().settledLpCount = this.state.settledFlows.size;
    }

    accrueProtocolFee(amount: bigint): void {
        this.state.protocolFees += amount;
    }

    takeProtocolFees(): bigint {
        const fees = this.state.protocolFees;
        this.state.protocolFees = 0n;
        return fees;
    }

    /**
     * Settle the current cycle into the running totals and open the next one.
     */
    finalizeCurrent(mintedShares: bigint, now: number): CycleRecord {
        const cycle = this.mutableCurrent();
        cycle.state = 'SETTLED';
        cycle.settledAt = now;

        this.state.settledSupplyShares += mintedShares - cycle.totalRedemptionShares;
        this.state.outstandingPrincipal += cycle.totalDeposits - cycle.redemptionPrincipal;
        if (this.state.settledSupplyShares < 0n || this.state.outstandingPrincipal < 0n) {
            throw new ConsistencyError('SettledTotalsNegative', 'settled supply or principal went negative', {
                cycle: cycle.index,
                settledSupplyShares: this.state.settledSupplyShares,
                outstandingPrincipal: this.state.outstandingPrincipal,
            });
        }
        this.state.lastSettlementPrice = cycle.settlementPrice;
        this.state.settledFlows = new Map();

        const next = cycle.index + 1;
        this.state.cycles.set(next, openCycle(next, now));
        this.state.currentCycle = next;
        this.state.poolState = PoolState.ACTIVE;
        return structuredClone(cycle);
    }

    recordHalt(snapshot: HaltSnapshot): void {
        this.state.halt = snapshot;
        this.state.poolState = PoolState.HALTED;
    }

    private record(index: number): CycleRecord {
        const cycle = this.state.cycles.get(index);
        if (!cycle) {
            throw new NotFoundError('UnknownCycle', `cycle ${index} does not exist`, { index });
        }
        return cycle;
    }
}
