import { StateError } from '../core/errors';
import { CycleView } from './cycleBook';
import { PoolState } from './types';

function stateCode(state: PoolState): string {
    switch (state) {
        case PoolState.HALTED:
            return 'PoolHalted';
        case PoolState.REBALANCING_OFFCHAIN:
        case PoolState.REBALANCING_ONCHAIN:
            return 'RebalanceInProgress';
        case PoolState.ACTIVE:
            return 'InvalidPoolState';
    }
}

export function requirePoolState(book: CycleView, operation: string, ...allowed: PoolState[]): void {
    const state = book.poolState();
    if (!allowed.includes(state)) {
        throw new StateError(stateCode(state), `${operation} not allowed while ${state}`, {
            operation,
            state,
        });
    }
}

export function requireNotHalted(book: CycleView, operation: string): void {
    if (book.poolState() === PoolState.HALTED) {
        throw new StateError('PoolHalted', `${operation} not allowed while HALTED`, { operation });
    }
}
