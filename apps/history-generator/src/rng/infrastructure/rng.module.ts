import { Module } from '@nestjs/common';
import { RUN_OPTIONS, RunOptions } from '@config/run-options.module';
import { Clock } from '@shared/ports/Clock';
import { SystemClock } from '@shared/infrastructure/SystemClock';
import { CLOCK, RANDOM_SOURCE } from '@shared/tokens';
import { RandomSource } from '@rng/domain/RandomSource';
import { SeededRandomSource } from '@rng/domain/SeededRandomSource';
import { MathRandomSource } from './MathRandomSource';

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new MathRandomSource() : new SeededRandomSource(seed);
}

@Module({
  providers: [
    {
      provide: RANDOM_SOURCE,
      useFactory: (run: RunOptions): RandomSource => createRandomSource(run.seed),
      inject: [RUN_OPTIONS],
    },
    {
      provide: CLOCK,
      useFactory: (): Clock => new SystemClock(),
    },
  ],
  exports: [RANDOM_SOURCE, CLOCK],
})
export class RngModule {}
