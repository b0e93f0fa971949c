/**
 * Default Pool Strategy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * INTEREST CURVE (annual, bps), piecewise linear in utilization u:
 *
 *   u <= tier1            → baseRate
 *   tier1 < u <= tier2    → baseRate + (rate1 - baseRate) * (u - tier1) / (tier2 - tier1)
 *   tier2 < u <= 100%     → rate1 + (maxRate - rate1) * (u - tier2) / (100% - tier2)
 *   u > 100%              → maxRate
 *
 * HEALTH:
 *   ratio < liquidationRatio → Liquidatable
 *   ratio < healthyRatio     → Warning
 *   otherwise                → Healthy   (zero exposure is always Healthy)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BPS } from '../config/constants';
import { DEFAULT_POLICY_PARAMETERS, PolicyParameters, validatePolicyParameters } from '../config/parameters';
import { mulDiv } from '../utils/math';
import { HealthTier, InterestSplit, LiquiditySnapshot, PoolStrategy } from './types';

export class DefaultPoolStrategy implements PoolStrategy {
    readonly parameters: Readonly<PolicyParameters>;

    constructor(
        parameters: Partial<PolicyParameters> = {},
        readonly id: string = 'default-strategy'
    ) {
        const merged: PolicyParameters = { ...DEFAULT_POLICY_PARAMETERS, ...parameters };
        validatePolicyParameters(merged);
        this.parameters = Object.freeze(merged);
    }

    interestRate(utilization: bigint): bigint {
        const { baseRate, rate1, maxRate, tier1, tier2 } = this.parameters;

        if (utilization <= tier1) {
            return baseRate;
        }
        if (utilization <= tier2) {
            return baseRate + mulDiv(rate1 - baseRate, utilization - tier1, tier2 - tier1);
        }
        if (utilization <= BPS) {
            return rate1 + mulDiv(maxRate - rate1, utilization - tier2, BPS - tier2);
        }
        return maxRate;
    }

    utilization(outstandingValue: bigint, totalCommitted: bigint): bigint {
        if (totalCommitted === 0n) {
            return 0n;
        }
        return mulDiv(outstandingValue, BPS, totalCommitted);
    }

    requiredCollateral(exposureValue: bigint, ratio: bigint): bigint {
        return mulDiv(exposureValue, ratio, BPS);
    }

    collateralRatio(collateral: bigint, exposureValue: bigint): bigint {
        if (exposureValue === 0n) {
            return 0n;
        }
        return mulDiv(collateral, BPS, exposureValue);
    }

    health(currentRatio: bigint, healthyRatio: bigint, liquidationRatio: bigint): HealthTier {
        if (currentRatio < liquidationRatio) {
            return HealthTier.Liquidatable;
        }
        if (currentRatio < healthyRatio) {
            return HealthTier.Warning;
        }
        return HealthTier.Healthy;
    }

    userHealth(netCollateral: bigint, exposureValue: bigint): HealthTier {
        if (exposureValue === 0n) {
            return HealthTier.Healthy;
        }
        const ratio = netCollateral <= 0n ? 0n : this.collateralRatio(netCollateral, exposureValue);
        return this.health(ratio, this.parameters.userHealthyRatio, this.parameters.userLiquidationRatio);
    }

    lpHealth(collateral: bigint, exposureValue: bigint): HealthTier {
        if (exposureValue === 0n) {
            return HealthTier.Healthy;
        }
        const ratio = this.collateralRatio(collateral, exposureValue);
        return this.health(ratio, this.parameters.lpHealthyRatio, this.parameters.lpLiquidationRatio);
    }

    availableLiquidity(snapshot: LiquiditySnapshot): bigint {
        const available = snapshot.totalCommitted
            + snapshot.pendingAdds
            - snapshot.pendingReductions
            - snapshot.utilized;
        return available > 0n ? available : 0n;
    }

    lpLiquidationReward(targetCollateral: bigint, amount: bigint, targetCommitted: bigint): bigint {
        if (targetCommitted === 0n) {
            return 0n;
        }
        const slice = mulDiv(targetCollateral, amount, targetCommitted);
        return mulDiv(slice, this.parameters.lpLiquidationRewardBps, BPS);
    }

    splitInterest(amount: bigint): InterestSplit {
        const protocolFee = mulDiv(amount, this.parameters.protocolFeeBps, BPS);
        return { lpShare: amount - protocolFee, protocolFee };
    }
}
