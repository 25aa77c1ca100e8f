import { RandomSource } from '@rng/domain/RandomSource';

/**
 * mulberry32: 32-bit state, full 2^32 period. Identical seeds replay
 * identical sequences, which is all fixture generation needs.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
      throw new RangeError(`Seed must be an unsigned 32-bit integer, got ${seed}`);
    }
    this.state = seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}
