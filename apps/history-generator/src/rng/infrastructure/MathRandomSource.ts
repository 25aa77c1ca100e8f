import { RandomSource } from '@rng/domain/RandomSource';

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}
