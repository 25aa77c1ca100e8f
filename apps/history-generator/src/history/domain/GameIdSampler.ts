import { InvalidSamplerRangeError } from '@shared/kernel/DomainError';
import { RandomSource, integerInSpan } from '@rng/domain/RandomSource';

export const DEFAULT_GAME_ID_BASE = 7_900_000;
export const DEFAULT_GAME_ID_SPAN = 100_000;

export class GameIdSampler {
  constructor(
    private readonly random: RandomSource,
    readonly base: number = DEFAULT_GAME_ID_BASE,
    readonly span: number = DEFAULT_GAME_ID_SPAN,
  ) {
    if (!Number.isSafeInteger(base) || base < 0) {
      throw new InvalidSamplerRangeError(`Game id base must be a non-negative integer, got ${base}`);
    }
    if (!Number.isSafeInteger(span) || span < 0) {
      throw new InvalidSamplerRangeError(`Game id span must be a non-negative integer, got ${span}`);
    }
  }

  /** Uniform in [base, base + span). */
  sample(): number {
    return integerInSpan(this.random, this.base, this.span);
  }
}
