export type {
    ReserveToken,
    SyntheticToken,
    SyntheticAccounting,
    SyntheticAccountingKind,
} from './types';

export { InMemoryReserveToken } from './reserveToken';
export { InMemorySyntheticToken } from './syntheticToken';
