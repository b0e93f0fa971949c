/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CYCLE TELEMETRY — ROLLING SETTLEMENT METRICS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One sample per finalized cycle: settlement price, net flow, interest,
 * how long each rebalance phase took and how many LPs had to be forced.
 * Keepers read computeCycleMetrics() to spot slow settlement or repeated
 * forcing before a pool drifts toward a halt.
 *
 * Samples are pool state: they are registered with the pool's transactor so
 * a reverted finalization leaves no sample behind.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS } from '../config/constants';
import { StatefulComponent } from '../state/transactor';
import logger from '../utils/logger';
import { absDiff, formatPrice, formatUnits, mulDiv } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const CYCLE_TELEMETRY_CONFIG = {
    // Maximum samples retained per pool
    MAX_SAMPLES: 500,

    // Default window for computeCycleMetrics()
    DEFAULT_WINDOW: 30,
};

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CycleSample {
    cycle: number;
    settledAt: number;
    price: bigint;
    /** Move from the previous sample's price, bps (0 for the first sample) */
    priceMoveBps: bigint;
    netFlow: bigint;
    deposits: bigint;
    interestAccrued: bigint;
    protocolFee: bigint;
    lpCount: number;
    forcedSettlements: number;
    /** offchain start → onchain start */
    offchainSeconds: number;
    /** onchain start → finalization */
    settlementSeconds: number;
}

export interface CycleMetrics {
    cycles: number;
    medianSettlementSeconds: number;
    p95SettlementSeconds: number;
    totalNetFlow: bigint;
    totalInterest: bigint;
    totalProtocolFees: bigint;
    forcedSettlements: number;
    maxPriceMoveBps: bigint;
}

export type CycleSampleInput = Omit<CycleSample, 'priceMoveBps' | 'forcedSettlements'>;

interface TelemetryState {
    samples: CycleSample[];
    /** cycle → forced settlements seen before it finalized */
    forced: Map<number, number>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function percentile(sorted: number[], p: number): number {
    if (sorted.length === 0) return 0;
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function median(sorted: number[]): number {
    if (sorted.length === 0) return 0;
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0
        ? (sorted[mid - 1] + sorted[mid]) / 2
        : sorted[mid];
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRACKER
// ═══════════════════════════════════════════════════════════════════════════════

export class CycleTelemetry extends StatefulComponent<TelemetryState> {
    constructor(poolId: string) {
        super(`telemetry:${poolId}`, { samples: [], forced: new Map() });
    }

    noteForcedSettlement(cycle: number): void {
        this.state.forced.set(cycle, (this.state.forced.get(cycle) ?? 0) + 1);
    }

    recordCycle(input: CycleSampleInput): CycleSample {
        const previous = this.state.samples[this.state.samples.length - 1];
        const priceMoveBps = previous && previous.price > 0n
            ? mulDiv(absDiff(input.price, previous.price), BPS, previous.price)
            : 0n;

        const sample: CycleSample = {
            ...input,
            priceMoveBps,
            forcedSettlements: this.state.forced.get(input.cycle) ?? 0,
        };
        this.state.forced.delete(input.cycle);
        this.state.samples.push(sample);
        if (this.state.samples.length > CYCLE_TELEMETRY_CONFIG.MAX_SAMPLES) {
            this.state.samples.shift();
        }
        return { ...sample };
    }

    recentSamples(count: number = CYCLE_TELEMETRY_CONFIG.DEFAULT_WINDOW): CycleSample[] {
        return this.state.samples.slice(-count).map(s => ({ ...s }));
    }

    computeCycleMetrics(window: number = CYCLE_TELEMETRY_CONFIG.DEFAULT_WINDOW): CycleMetrics {
        const samples = this.state.samples.slice(-window);
        const durations = samples.map(s => s.settlementSeconds).sort((a, b) => a - b);

        let totalNetFlow = 0n;
        let totalInterest = 0n;
        let totalProtocolFees = 0n;
        let maxPriceMoveBps = 0n;
        let forcedSettlements = 0;
        for (const s of samples) {
            totalNetFlow += s.netFlow;
            totalInterest += s.interestAccrued;
            totalProtocolFees += s.protocolFee;
            forcedSettlements += s.forcedSettlements;
            if (s.priceMoveBps > maxPriceMoveBps) {
                maxPriceMoveBps = s.priceMoveBps;
            }
        }

        return {
            cycles: samples.length,
            medianSettlementSeconds: median(durations),
            p95SettlementSeconds: percentile(durations, 95),
            totalNetFlow,
            totalInterest,
            totalProtocolFees,
            forcedSettlements,
            maxPriceMoveBps,
        };
    }

    logTelemetrySummary(reserveDecimals: number): void {
        const m = this.computeCycleMetrics();
        const last = this.state.samples[this.state.samples.length - 1];
        logger.info(`[CYCLE-TELEMETRY] ═══ ${this.name} ═══`);
        logger.info(
            `[CYCLE-TELEMETRY] cycles=${m.cycles} settle median=${m.medianSettlementSeconds}s ` +
            `p95=${m.p95SettlementSeconds}s forced=${m.forcedSettlements}`
        );
        logger.info(
            `[CYCLE-TELEMETRY] netFlow=${formatUnits(m.totalNetFlow, reserveDecimals)} ` +
            `interest=${formatUnits(m.totalInterest, reserveDecimals)} ` +
            `fees=${formatUnits(m.totalProtocolFees, reserveDecimals)} maxMove=${m.maxPriceMoveBps}bps ` +
            `lastPrice=${last ? formatPrice(last.price) : 'n/a'}`
        );
    }
}
