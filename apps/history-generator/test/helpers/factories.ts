import { RandomSource } from '@rng/domain/RandomSource';
import { Clock } from '@shared/ports/Clock';
import { CrashPointSampler } from '@history/domain/CrashPointSampler';
import { CrashDistribution } from '@shared/kernel/GeneratorConfig';
import { GameIdSampler } from '@history/domain/GameIdSampler';
import { HashSampler } from '@history/domain/HashSampler';
import { TimestampSampler } from '@history/domain/TimestampSampler';
import { GameRecordFactory } from '@history/domain/GameRecordFactory';

export function createRecordFactory(
  random: RandomSource,
  clock: Clock,
  distribution: CrashDistribution = 'legacy',
): GameRecordFactory {
  return new GameRecordFactory(
    new GameIdSampler(random),
    new CrashPointSampler(random, distribution),
    new HashSampler(random),
    new TimestampSampler(random, clock),
  );
}
