/**
 * Asset Pool Factory
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * createAssetPool() wires one independently-owned pool: its own transactor,
 * synthetic token, cycle book, ledgers, orchestrator and telemetry. Policy
 * and the capability service are shared immutable references.
 *
 * Every stateful component a pool operation can touch is registered with the
 * pool's transactor, including the reserve token, so a failed operation
 * rolls back balances as well as ledgers.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createPoolConfig, PoolConfig, PoolConfigOverrides } from '../config/parameters';
import { AuthorizationError, ValidationError, requirePrincipal } from '../core/errors';
import { AssetOracle } from '../oracle/types';
import { PoolStrategy } from '../policy/types';
import { CapabilityService } from '../registry/capabilities';
import { Snapshottable, Transactor } from '../state/transactor';
import { CycleTelemetry } from '../telemetry/cycleTelemetry';
import { InMemorySyntheticToken } from '../tokens/syntheticToken';
import { ReserveToken, SyntheticAccounting } from '../tokens/types';
import { Clock } from '../utils/clock';
import { generateUUID } from '../utils/id';
import logger from '../utils/logger';
import { PriceConverter } from './conversion';
import { CycleBook } from './cycleBook';
import { CycleOrchestrator } from './cycleOrchestrator';
import { LPLedger } from './lpLedger';
import { UserLedger } from './userLedger';

export type SnapshottableReserveToken = ReserveToken & Snapshottable<unknown>;

export interface AssetPoolDeps {
    /** Asset symbol; the synthetic token is `x${symbol}` unless named */
    symbol: string;
    syntheticSymbol?: string;
    accounting?: SyntheticAccounting;
    /** Policy comes from the strategy; only cycle timing and decimals are set here */
    config?: Omit<PoolConfigOverrides, 'policy'>;
    strategy: PoolStrategy;
    oracle: AssetOracle;
    reserve: SnapshottableReserveToken;
    capabilities: CapabilityService;
    clock: Clock;
    /** Defaults to a fresh uuid */
    poolId?: string;
}

export interface AssetPool {
    readonly id: string;
    /** Custody account holding escrow, collateral and float */
    readonly account: string;
    readonly config: PoolConfig;
    readonly users: UserLedger;
    readonly lps: LPLedger;
    readonly cycles: CycleOrchestrator;
    readonly book: CycleBook;
    readonly synthetic: InMemorySyntheticToken;
    readonly reserve: ReserveToken;
    readonly oracle: AssetOracle;
    readonly strategy: PoolStrategy;
    readonly telemetry: CycleTelemetry;
    readonly transactor: Transactor;
}

export function createAssetPool(deps: AssetPoolDeps): AssetPool {
    requirePrincipal(deps.symbol, 'symbol');
    if (!deps.capabilities.isVerifiedOracle(deps.oracle.symbol)) {
        throw new AuthorizationError('UnverifiedOracle', `oracle for ${deps.oracle.symbol} is not verified`, {
            oracle: deps.oracle.symbol,
        });
    }
    if (deps.oracle.symbol !== deps.symbol) {
        throw new ValidationError('OracleMismatch', `oracle quotes ${deps.oracle.symbol}, pool is ${deps.symbol}`);
    }
    if (!deps.capabilities.isVerifiedStrategy(deps.strategy.id)) {
        throw new AuthorizationError('UnverifiedStrategy', `strategy ${deps.strategy.id} is not verified`, {
            strategy: deps.strategy.id,
        });
    }

    const config = createPoolConfig({
        cycle: deps.config?.cycle,
        reserveDecimals: deps.config?.reserveDecimals ?? deps.reserve.decimals,
        policy: { ...deps.strategy.parameters },
    });
    if (config.reserveDecimals !== deps.reserve.decimals) {
        throw new ValidationError('InvalidParameter', 'reserveDecimals must match the reserve token', {
            reserveDecimals: config.reserveDecimals,
            tokenDecimals: deps.reserve.decimals,
        });
    }

    const id = deps.poolId ?? generateUUID();
    deps.capabilities.registerPool(id);
    const account = `pool:${id}`;
    const transactor = new Transactor();
    const converter = new PriceConverter(config.reserveDecimals);
    const synthetic = new InMemorySyntheticToken(deps.syntheticSymbol ?? `x${deps.symbol}`, deps.accounting);
    const book = new CycleBook(deps.clock, synthetic, converter);
    const telemetry = new CycleTelemetry(id);

    const lps = new LPLedger({
        poolAccount: account,
        book,
        strategy: deps.strategy,
        reserve: deps.reserve,
        capabilities: deps.capabilities,
        clock: deps.clock,
        transactor,
    });
    const users = new UserLedger({
        poolAccount: account,
        book,
        strategy: deps.strategy,
        synthetic,
        reserve: deps.reserve,
        converter,
        liquidity: lps,
        transactor,
    });
    const cycles = new CycleOrchestrator({
        poolAccount: account,
        book,
        lps,
        users,
        strategy: deps.strategy,
        oracle: deps.oracle,
        synthetic,
        reserve: deps.reserve,
        converter,
        capabilities: deps.capabilities,
        clock: deps.clock,
        cycle: config.cycle,
        telemetry,
        transactor,
    });

    transactor.register(deps.reserve);
    transactor.register(synthetic);
    transactor.register(book);
    transactor.register(users);
    transactor.register(lps);
    transactor.register(telemetry);

    logger.info(
        `[FACTORY] pool created id=${id} asset=${deps.symbol} synthetic=${synthetic.symbol} ` +
        `accounting=${synthetic.accounting} strategy=${deps.strategy.id} reserve=${deps.reserve.symbol}`
    );

    return {
        id,
        account,
        config,
        users,
        lps,
        cycles,
        book,
        synthetic,
        reserve: deps.reserve,
        oracle: deps.oracle,
        strategy: deps.strategy,
        telemetry,
        transactor,
    };
}
