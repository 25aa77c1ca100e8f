import { CrashPoint } from '@shared/kernel/CrashPoint';
import { CrashDistribution } from '@shared/kernel/GeneratorConfig';
import { RandomSource, uniform } from '@rng/domain/RandomSource';

export interface CrashTier {
  readonly min: number;
  readonly max: number;
}

export const LOW_TIER: CrashTier = { min: 1.0, max: 3.0 };
export const MID_TIER: CrashTier = { min: 3.0, max: 10.0 };
export const HIGH_TIER: CrashTier = { min: 10.0, max: 100.0 };

const CUMULATIVE_TABLE: ReadonlyArray<readonly [number, CrashTier]> = [
  [0.8, LOW_TIER],
  [0.95, MID_TIER],
  [1.0, HIGH_TIER],
];

/**
 * `legacy` draws twice once the low tier is missed, so the realized split is
 * roughly 80/19/1. `cumulative` uses one draw and realizes 80/15/5.
 */
export class CrashPointSampler {
  constructor(
    private readonly random: RandomSource,
    readonly distribution: CrashDistribution = 'legacy',
  ) {}

  sample(): CrashPoint {
    const tier = this.pickTier();
    return CrashPoint.rounded(uniform(this.random, tier.min, tier.max));
  }

  pickTier(): CrashTier {
    return this.distribution === 'cumulative'
      ? this.pickCumulative()
      : this.pickLegacy();
  }

  private pickLegacy(): CrashTier {
    if (this.random.next() < 0.8) return LOW_TIER;
    // Independent second draw
    if (this.random.next() < 0.95) return MID_TIER;
    return HIGH_TIER;
  }

  private pickCumulative(): CrashTier {
    const roll = this.random.next();
    for (const [threshold, tier] of CUMULATIVE_TABLE) {
      if (roll < threshold) return tier;
    }
    return HIGH_TIER;
  }
}
