/**
 * Pool Module
 *
 * One asset pool: user ledger, LP ledger, cycle orchestrator and the cycle
 * book they share, wired by createAssetPool().
 */

export type {
    CycleRecord,
    CycleStatus,
    DeviationStatus,
    HaltSnapshot,
    LiquidationClaim,
    LpObligation,
    LpPosition,
    LpRequest,
    UserPosition,
    UserRequest,
} from './types';

export { PoolState, UserRequestKind, LpRequestKind } from './types';

export type { CycleView, CycleIntake } from './cycleBook';
export type { ClaimResult, LiquidityView } from './userLedger';
export type { FlowSettlement, LpInvariantCheck } from './lpLedger';
export type { ForceRebalanceResult, RebalanceResult } from './cycleOrchestrator';
export type { AssetPool, AssetPoolDeps, SnapshottableReserveToken } from './factory';

export { CycleBook } from './cycleBook';
export { UserLedger, interestDebt } from './userLedger';
export { LPLedger } from './lpLedger';
export { CycleOrchestrator } from './cycleOrchestrator';
export { PriceConverter, proRata } from './conversion';
export { createAssetPool } from './factory';
