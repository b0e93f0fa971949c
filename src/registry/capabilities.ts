/**
 * Capability Service
 *
 * Allow-lists and roles injected into each pool at construction: admin
 * principals, verified oracles (by asset symbol), verified strategies and
 * the pools a factory has deployed. One service may be shared by every pool
 * a factory creates.
 */

import { AuthorizationError, ValidationError, requirePrincipal } from '../core/errors';
import logger from '../utils/logger';

export interface CapabilityService {
    isAdmin(principal: string): boolean;
    requireAdmin(principal: string): void;
    isVerifiedOracle(oracleId: string): boolean;
    isVerifiedStrategy(strategyId: string): boolean;
    isVerifiedPool(poolId: string): boolean;
    /** Record a freshly deployed pool; ids are never reused */
    registerPool(poolId: string): void;
}

export interface CapabilitySeed {
    admins: string[];
    oracles?: string[];
    strategies?: string[];
    pools?: string[];
}

export type CapabilityList = 'admins' | 'oracles' | 'strategies' | 'pools';

export class InMemoryCapabilityService implements CapabilityService {
    private readonly lists: Record<CapabilityList, Set<string>>;

    constructor(seed: CapabilitySeed) {
        if (seed.admins.length === 0) {
            throw new AuthorizationError('NoAdmin', 'capability service needs at least one admin');
        }
        this.lists = {
            admins: new Set(seed.admins),
            oracles: new Set(seed.oracles ?? []),
            strategies: new Set(seed.strategies ?? []),
            pools: new Set(seed.pools ?? []),
        };
    }

    isAdmin(principal: string): boolean {
        return this.lists.admins.has(principal);
    }

    requireAdmin(principal: string): void {
        if (!this.isAdmin(principal)) {
            throw new AuthorizationError('NotAdmin', `${principal} is not an admin`, { principal });
        }
    }

    isVerifiedOracle(oracleId: string): boolean {
        return this.lists.oracles.has(oracleId);
    }

    isVerifiedStrategy(strategyId: string): boolean {
        return this.lists.strategies.has(strategyId);
    }

    isVerifiedPool(poolId: string): boolean {
        return this.lists.pools.has(poolId);
    }

    registerPool(poolId: string): void {
        requirePrincipal(poolId, 'poolId');
        if (this.lists.pools.has(poolId)) {
            throw new ValidationError('DuplicatePool', `pool ${poolId} is already registered`, { poolId });
        }
        this.lists.pools.add(poolId);
        logger.info(`[REGISTRY] pool registered ${poolId}`);
    }

    grant(caller: string, list: CapabilityList, id: string): void {
        this.requireAdmin(caller);
        requirePrincipal(id, 'id');
        this.lists[list].add(id);
        logger.info(`[REGISTRY] ${caller} added ${id} to ${list}`);
    }

    revoke(caller: string, list: CapabilityList, id: string): void {
        this.requireAdmin(caller);
        if (list === 'admins' && this.lists.admins.size === 1 && this.lists.admins.has(id)) {
            throw new AuthorizationError('LastAdmin', 'cannot revoke the last admin', { id });
        }
        this.lists[list].delete(id);
        logger.info(`[REGISTRY] ${caller} removed ${id} from ${list}`);
    }
}
