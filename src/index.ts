/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CYCLE POOL ENGINE — PUBLIC API
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * No runtime logic at import time. Callers build their collaborators
 * (reserve token, oracle, strategy, capability service, clock) and hand them
 * to createAssetPool().
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './pool';
export * from './policy';
export * from './tokens';
export * from './oracle';
export * from './telemetry';

export type { CapabilityService, CapabilitySeed, CapabilityList } from './registry/capabilities';
export { InMemoryCapabilityService } from './registry/capabilities';

export type { PoolConfig, PoolConfigOverrides, PolicyParameters, CycleParameters } from './config/parameters';
export {
    DEFAULT_POOL_CONFIG,
    DEFAULT_POLICY_PARAMETERS,
    DEFAULT_CYCLE_PARAMETERS,
    createPoolConfig,
    loadPoolConfigFromEnv,
} from './config/parameters';
export { PRECISION, BPS, SECONDS_PER_YEAR, ASSET_DECIMALS, POOL_LIMITS } from './config/constants';

export {
    ProtocolError,
    StateError,
    ValidationError,
    AuthorizationError,
    ConsistencyError,
    StalenessError,
    NotFoundError,
    isProtocolError,
} from './core/errors';
export type { ErrorKind, ErrorDetails } from './core/errors';

export type { Clock } from './utils/clock';
export { SystemClock, ManualClock } from './utils/clock';
export { Transactor, StatefulComponent } from './state/transactor';
export type { Snapshottable } from './state/transactor';
export { parseUnits, formatUnits, formatPrice } from './utils/math';
export { default as logger } from './utils/logger';
