export type {
    AssetOracle,
    AssetOracleConfig,
    OhlcInput,
    OhlcQuote,
} from './types';

export { DEFAULT_ORACLE_CONFIG, createOracleConfig } from './config';
export { InMemoryAssetOracle } from './assetOracle';
