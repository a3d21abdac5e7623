/** Uniform random numbers in `[0, 1)`. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Draw an integer uniformly from the inclusive range `[min, max]`. */
export function drawInclusive(random: RandomSource, min: number, max: number): number {
  if (max <= min) return min;
  const value = min + Math.floor(random.next() * (max - min + 1));
  return Math.min(max, Math.max(min, value));
}
