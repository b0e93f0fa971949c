/**
 * Shared monotonic clock in whole seconds. Every deadline in the pool
 * (cycle length, rebalance length, halt threshold, oracle age) is compared
 * against one Clock instance.
 */
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    private last = 0;

    now(): number {
        const current = Math.floor(Date.now() / 1000);
        // never run backwards when the wall clock is adjusted
        this.last = Math.max(this.last, current);
        return this.last;
    }
}

/**
 * Clock advanced explicitly. Used by tests and simulations.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 1_700_000_000) {}

    now(): number {
        return this.current;
    }

    advance(seconds: number): number {
        if (seconds < 0) {
            throw new RangeError('ManualClock cannot move backwards');
        }
        this.current += seconds;
        return this.current;
    }

    set(timestamp: number): void {
        if (timestamp < this.current) {
            throw new RangeError('ManualClock cannot move backwards');
        }
        this.current = timestamp;
    }
}
