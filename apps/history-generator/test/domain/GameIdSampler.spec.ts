import {
  GameIdSampler,
  DEFAULT_GAME_ID_BASE,
  DEFAULT_GAME_ID_SPAN,
} from '@history/domain/GameIdSampler';
import { InvalidSamplerRangeError } from '@shared/kernel/DomainError';
import { SeededRandomSource } from '@rng/domain/SeededRandomSource';
import { ScriptedRandomSource } from '../helpers/fakes';

describe('GameIdSampler', () => {
  it('defaults to [7,900,000, 8,000,000)', () => {
    const sampler = new GameIdSampler(new SeededRandomSource(3));
    expect(sampler.base).toBe(DEFAULT_GAME_ID_BASE);
    expect(sampler.span).toBe(DEFAULT_GAME_ID_SPAN);
    for (let i = 0; i < 5_000; i++) {
      const id = sampler.sample();
      expect(Number.isInteger(id)).toBe(true);
      expect(id).toBeGreaterThanOrEqual(7_900_000);
      expect(id).toBeLessThan(8_000_000);
    }
  });

  it('maps the draw onto the half-open range', () => {
    expect(new GameIdSampler(new ScriptedRandomSource([0])).sample()).toBe(7_900_000);
    expect(new GameIdSampler(new ScriptedRandomSource([0.999999])).sample()).toBe(7_999_999);
  });

  it('honours a custom base and span', () => {
    const sampler = new GameIdSampler(new ScriptedRandomSource([0.55]), 100, 10);
    expect(sampler.sample()).toBe(105);
  });

  it('always returns the base when the span is 0', () => {
    const sampler = new GameIdSampler(new SeededRandomSource(5), 1234, 0);
    expect(sampler.sample()).toBe(1234);
    expect(sampler.sample()).toBe(1234);
  });

  it('rejects a negative base or span', () => {
    const random = new ScriptedRandomSource([]);
    expect(() => new GameIdSampler(random, -1, 10)).toThrow(InvalidSamplerRangeError);
    expect(() => new GameIdSampler(random, 10, -1)).toThrow(InvalidSamplerRangeError);
  });

  it('rejects a fractional span', () => {
    expect(() => new GameIdSampler(new ScriptedRandomSource([]), 10, 2.5)).toThrow(
      InvalidSamplerRangeError,
    );
  });
});
