export interface RandomSource {
  /** Uniform value in [0, 1). */
  next(): number;
}

/** Uniform float in [min, max). */
export function uniform(source: RandomSource, min: number, max: number): number {
  return min + source.next() * (max - min);
}

/** Uniform integer in [min, min + span). A span of 0 yields min. */
export function integerInSpan(source: RandomSource, min: number, span: number): number {
  return min + Math.floor(source.next() * span);
}
