import { CrashPoint } from '@shared/kernel/CrashPoint';
import { InvalidCrashPointError } from '@shared/kernel/DomainError';

describe('CrashPoint', () => {
  it('wraps a value >= 1.00', () => {
    expect(CrashPoint.of(2.5).value).toBe(2.5);
  });

  it('allows exactly 1.00', () => {
    expect(CrashPoint.of(1.0).value).toBe(1.0);
  });

  it('throws for values < 1.00', () => {
    expect(() => CrashPoint.of(0.5)).toThrow(InvalidCrashPointError);
    expect(() => CrashPoint.of(0.99)).toThrow(InvalidCrashPointError);
  });

  it('throws for NaN', () => {
    expect(() => CrashPoint.of(Number.NaN)).toThrow(InvalidCrashPointError);
  });

  describe('rounded', () => {
    it('rounds to two fractional digits', () => {
      expect(CrashPoint.rounded(2.567).value).toBe(2.57);
      expect(CrashPoint.rounded(6.5).value).toBe(6.5);
      expect(CrashPoint.rounded(99.999).value).toBe(100);
    });

    it('accepts a raw value that rounds up to 1.00', () => {
      expect(CrashPoint.rounded(0.996).value).toBe(1);
    });

    it('rejects a raw value that rounds below 1.00', () => {
      expect(() => CrashPoint.rounded(0.994)).toThrow(InvalidCrashPointError);
    });
  });
});
