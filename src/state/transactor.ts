/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TRANSACTOR — ALL-OR-NOTHING OPERATION SCOPE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every public pool operation runs inside `run()`. On entry the transactor
 * snapshots every registered component; if the operation throws, every
 * component is restored to that snapshot before the error propagates.
 *
 * RULES:
 * - Components keep all mutable state in one plain object (Maps, arrays,
 *   bigints, primitives) so structuredClone can copy it.
 * - Nested run() calls join the outer scope; only the outermost scope
 *   snapshots and restores.
 * - Nothing is retried here. Retrying is the caller's decision.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { logRejectionRateLimited } from '../utils/rateLimitedLogger';
import { isProtocolError } from '../core/errors';

export interface Snapshottable<S> {
    readonly name: string;
    snapshot(): S;
    restore(snapshot: S): void;
}

interface Checkpoint {
    restore(): void;
}

function checkpoint<S>(component: Snapshottable<S>): Checkpoint {
    const saved = component.snapshot();
    return {
        restore: () => component.restore(saved),
    };
}

export class Transactor {
    private readonly components: Snapshottable<unknown>[] = [];
    private depth = 0;
    private committed = 0;
    private reverted = 0;

    register<S>(component: Snapshottable<S>): void {
        if (this.components.some(c => c.name === component.name)) {
            throw new Error(`[TRANSACTOR] component already registered: ${component.name}`);
        }
        this.components.push(component);
    }

    get inScope(): boolean {
        return this.depth > 0;
    }

    /**
     * Run `fn` atomically. `operation` and `principal` label rejections in logs.
     */
    run<T>(operation: string, principal: string, fn: () => T): T {
        if (this.depth > 0) {
            return fn();
        }

        const checkpoints = this.components.map(c => checkpoint(c));
        this.depth++;
        try {
            const result = fn();
            this.committed++;
            return result;
        } catch (err) {
            for (let i = checkpoints.length - 1; i >= 0; i--) {
                checkpoints[i].restore();
            }
            this.reverted++;
            if (isProtocolError(err)) {
                logRejectionRateLimited(operation, principal, err.code, err.message);
            } else {
                logger.error(`[TRANSACTOR] op=${operation} principal=${principal} reverted on unexpected error: ${String(err)}`);
            }
            throw err;
        } finally {
            this.depth--;
        }
    }

    stats(): { committed: number; reverted: number } {
        return { committed: this.committed, reverted: this.reverted };
    }
}

/**
 * Base for components whose whole mutable state lives in `state`.
 */
export abstract class StatefulComponent<S> implements Snapshottable<S> {
    protected constructor(
        public readonly name: string,
        protected state: S
    ) {}

    snapshot(): S {
        return structuredClone(this.state);
    }

    restore(snapshot: S): void {
        this.state = snapshot;
    }
}
