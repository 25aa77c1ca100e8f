export const CRASH_DISTRIBUTIONS = ['legacy', 'cumulative'] as const;

export type CrashDistribution = (typeof CRASH_DISTRIBUTIONS)[number];

export interface GeneratorConfig {
  gameIdBase: number;
  gameIdSpan: number;
  timestampWindowMs: number;
  distribution: CrashDistribution;
}
