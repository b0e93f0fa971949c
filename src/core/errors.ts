/**
 * Protocol error taxonomy.
 *
 * Every guard failure throws one of these. The throw aborts the whole
 * operation: the Transactor restores every component to its pre-call
 * snapshot, so callers never observe a partial mutation.
 */

export type ErrorKind =
    | 'StateError'
    | 'ValidationError'
    | 'AuthorizationError'
    | 'ConsistencyError'
    | 'StalenessError'
    | 'NotFoundError';

export type ErrorDetails = Record<string, string | number | bigint | boolean | null>;

export class ProtocolError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        public readonly code: string,
        message: string,
        public readonly details: ErrorDetails = {}
    ) {
        super(`[${code}] ${message}`);
        this.name = kind;
    }
}

/** Operation invalid for the current pool or cycle state */
export class StateError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('StateError', code, message, details);
    }
}

/** Zero or invalid amount or address, amount above a cap */
export class ValidationError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('ValidationError', code, message, details);
    }
}

/** Caller lacks the required role */
export class AuthorizationError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('AuthorizationError', code, message, details);
    }
}

/** Insufficient balance, collateral or liquidity */
export class ConsistencyError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('ConsistencyError', code, message, details);
    }
}

/** Oracle data too old or price deviation unresolved */
export class StalenessError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('StalenessError', code, message, details);
    }
}

/** No pending request or nothing to act on */
export class NotFoundError extends ProtocolError {
    constructor(code: string, message: string, details?: ErrorDetails) {
        super('NotFoundError', code, message, details);
    }
}

export function isProtocolError(err: unknown): err is ProtocolError {
    return err instanceof ProtocolError;
}

export function requirePositive(amount: bigint, field: string = 'amount'): void {
    if (amount <= 0n) {
        throw new ValidationError('InvalidAmount', `${field} must be positive`, { [field]: amount });
    }
}

export function requirePrincipal(principal: string, field: string = 'principal'): void {
    if (principal.trim().length === 0) {
        throw new ValidationError('InvalidAddress', `${field} must be a non-empty identifier`);
    }
}
