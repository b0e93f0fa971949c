/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TELEMETRY MODULE — CYCLE SETTLEMENT METRICS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * USAGE:
 *   pool.telemetry.computeCycleMetrics(10);
 *   pool.telemetry.logTelemetrySummary(pool.config.reserveDecimals);
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type { CycleMetrics, CycleSample, CycleSampleInput } from './cycleTelemetry';

export { CycleTelemetry, CYCLE_TELEMETRY_CONFIG } from './cycleTelemetry';
