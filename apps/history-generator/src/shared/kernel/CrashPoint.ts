import { InvalidCrashPointError } from '@shared/kernel/DomainError';

export class CrashPoint {
  private constructor(readonly value: number) {
    if (!Number.isFinite(value) || value < 1.0) {
      throw new InvalidCrashPointError(`Crash point must be >= 1.00, got ${value}`);
    }
  }

  static of(value: number): CrashPoint {
    return new CrashPoint(value);
  }

  /** Rounds half away from zero to two fractional digits. */
  static rounded(raw: number): CrashPoint {
    return new CrashPoint(Math.round(raw * 100) / 100);
  }
}
