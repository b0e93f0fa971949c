/**
 * Request ID Generation
 *
 * Every request (user or LP) gets a fresh id at submission so log lines for
 * one request can be correlated from submission to claim.
 *
 * FORMAT: {kind}-{uuid v4}
 */

import { v4 as uuidv4 } from 'uuid';

export type RequestIdKind = 'dep' | 'red' | 'liq' | 'add' | 'red-lp' | 'liq-lp';

/**
 * Generate a unique request id.
 *
 * @example
 * generateRequestId('dep'); // "dep-550e8400-e29b-41d4-a716-446655440000"
 */
export function generateRequestId(kind: RequestIdKind): string {
    return `${kind}-${uuidv4()}`;
}

/**
 * Generate a bare uuid (pool instance ids).
 */
export function generateUUID(): string {
    return uuidv4();
}
