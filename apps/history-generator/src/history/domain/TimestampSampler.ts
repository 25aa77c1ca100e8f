import { InvalidTimeWindowError } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { RandomSource } from '@rng/domain/RandomSource';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_WINDOW_MS = 7 * DAY_MS;

export interface TimeWindow {
  startMs?: number;
  endMs?: number;
}

export class TimestampSampler {
  constructor(
    private readonly random: RandomSource,
    private readonly clock: Clock,
    readonly windowMs: number = DEFAULT_WINDOW_MS,
  ) {}

  /**
   * Uniform integer in [startMs, endMs]. Missing bounds are resolved against
   * the clock on every call.
   */
  sample(window: TimeWindow = {}): number {
    const now = this.clock.now();
    const startMs = Math.floor(window.startMs ?? now - this.windowMs);
    const endMs = Math.floor(window.endMs ?? now);

    if (startMs > endMs) {
      throw new InvalidTimeWindowError(
        `Window start ${startMs} is after window end ${endMs}`,
      );
    }

    return startMs + Math.floor(this.random.next() * (endMs - startMs + 1));
  }
}
