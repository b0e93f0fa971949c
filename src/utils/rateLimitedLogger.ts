/**
 * Rate-Limited Rejection Log
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Keepers retry the cycle transitions on a timer, so the same rejection
 * (OracleStale, MarketOpen, RebalancePeriodActive...) can repeat every few
 * seconds for hours. Each (operation, principal, code) triple is logged at
 * most once per window; the next line that gets through carries the count of
 * lines held back since the last one.
 *
 * USAGE:
 *   logRejectionRateLimited('initiateOnchainRebalance', 'keeper', 'MarketOpen', message);
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from './logger';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const RATE_LIMIT_CONFIG = {
    /** Window for user-facing rejections (ms) */
    REJECT_WINDOW_MS: 30 * 1000,

    /** Window for phase-gate rejections keepers retry on a timer (ms) */
    PHASE_GATE_WINDOW_MS: 5 * 60 * 1000,

    /** Codes produced by cycle deadlines and market-hours gates */
    PHASE_GATE_CODES: new Set([
        'CycleInProgress',
        'RebalancePeriodActive',
        'MarketOpen',
        'MarketClosed',
        'OracleStale',
        'HaltThresholdNotReached',
    ]),

    /** Tracked keys before the least recently logged one is evicted */
    MAX_TRACKED_KEYS: 1000,
};

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface WindowEntry {
    loggedAt: number;
    held: number;
}

export interface HeldRejection {
    key: string;
    held: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIMITER
// ═══════════════════════════════════════════════════════════════════════════════

export class RejectionLimiter {
    private readonly entries = new Map<string, WindowEntry>();

    constructor(private readonly now: () => number = Date.now) {}

    /**
     * Log the rejection unless its key was logged inside the window.
     * Returns true when a line was written.
     */
    record(operation: string, principal: string, code: string, message: string): boolean {
        const key = `${operation}:${principal}:${code}`;
        const now = this.now();
        const window = RATE_LIMIT_CONFIG.PHASE_GATE_CODES.has(code)
            ? RATE_LIMIT_CONFIG.PHASE_GATE_WINDOW_MS
            : RATE_LIMIT_CONFIG.REJECT_WINDOW_MS;

        const entry = this.entries.get(key);
        if (entry && now - entry.loggedAt < window) {
            entry.held++;
            return false;
        }

        const suffix = entry && entry.held > 0
            ? ` (held=${entry.held} over ${Math.floor((now - entry.loggedAt) / 1000)}s)`
            : '';
        logger.warn(`[REJECT] op=${operation} principal=${principal} code=${code} ${message}${suffix}`);

        // re-insert so iteration order tracks recency
        this.entries.delete(key);
        if (this.entries.size >= RATE_LIMIT_CONFIG.MAX_TRACKED_KEYS) {
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.entries.delete(oldest.value);
            }
        }
        this.entries.set(key, { loggedAt: now, held: 0 });
        return true;
    }

    /** Keys with lines currently held back, most held first */
    held(): HeldRejection[] {
        return [...this.entries]
            .filter(([, entry]) => entry.held > 0)
            .map(([key, entry]) => ({ key, held: entry.held }))
            .sort((a, b) => b.held - a.held);
    }

    trackedKeys(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}

const defaultLimiter = new RejectionLimiter();

/**
 * Log a rejected pool operation through the process-wide limiter.
 */
export function logRejectionRateLimited(
    operation: string,
    principal: string,
    code: string,
    message: string
): boolean {
    return defaultLimiter.record(operation, principal, code, message);
}
