import { StatefulComponent } from '../state/transactor';
import { ConsistencyError, ValidationError } from '../core/errors';
import { ReserveToken } from './types';

interface ReserveTokenState {
    balances: Map<string, bigint>;
    allowances: Map<string, bigint>;
    totalSupply: bigint;
}

function allowanceKey(owner: string, spender: string): string {
    return `${owner}->${spender}`;
}

function requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
        throw new ValidationError('InvalidAmount', 'token amount cannot be negative', { amount });
    }
}

/**
 * In-memory reserve token ledger with standard approve/transferFrom rules.
 */
export class InMemoryReserveToken extends StatefulComponent<ReserveTokenState> implements ReserveToken {
    constructor(
        readonly symbol: string = 'USDC',
        readonly decimals: number = 6
    ) {
        super(`reserve:${symbol}`, {
            balances: new Map(),
            allowances: new Map(),
            totalSupply: 0n,
        });
    }

    balanceOf(account: string): bigint {
        return this.state.balances.get(account) ?? 0n;
    }

    allowance(owner: string, spender: string): bigint {
        return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
    }

    totalSupply(): bigint {
        return this.state.totalSupply;
    }

    approve(owner: string, spender: string, amount: bigint): void {
        requireNonNegative(amount);
        this.state.allowances.set(allowanceKey(owner, spender), amount);
    }

    transfer(from: string, to: string, amount: bigint): void {
        requireNonNegative(amount);
        if (amount === 0n || from === to) {
            return;
        }
        const fromBalance = this.balanceOf(from);
        if (fromBalance < amount) {
            throw new ConsistencyError('InsufficientBalance', `${this.symbol} balance too low`, {
                account: from,
                balance: fromBalance,
                amount,
            });
        }
        this.state.balances.set(from, fromBalance - amount);
        this.state.balances.set(to, this.balanceOf(to) + amount);
    }

    transferFrom(spender: string, from: string, to: string, amount: bigint): void {
        requireNonNegative(amount);
        if (spender !== from && amount > 0n) {
            const allowed = this.allowance(from, spender);
            if (allowed < amount) {
                throw new ConsistencyError('InsufficientAllowance', `${this.symbol} allowance too low`, {
                    owner: from,
                    spender,
                    allowance: allowed,
                    amount,
                });
            }
            this.state.allowances.set(allowanceKey(from, spender), allowed - amount);
        }
        this.transfer(from, to, amount);
    }

    /** Faucet used by treasuries and tests */
    mint(to: string, amount: bigint): void {
        requireNonNegative(amount);
        this.state.balances.set(to, this.balanceOf(to) + amount);
        this.state.totalSupply += amount;
    }
}
