import { AssetOracleConfig } from './types';

export const DEFAULT_ORACLE_CONFIG: AssetOracleConfig = {
    splitDetectionBps: 4_000n,   // 40% move
    splitToleranceBps: 200n,     // 2%
    minUpdateInterval: 0,
};

/**
 * Create a custom config with overrides
 */
export function createOracleConfig(overrides: Partial<AssetOracleConfig> = {}): AssetOracleConfig {
    return {
        ...DEFAULT_ORACLE_CONFIG,
        ...overrides,
    };
}
