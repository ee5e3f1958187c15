/**
 * Source of uniformly distributed numbers in [0, 1). Injected wherever the
 * engine randomizes so that schedules can be replayed in tests.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function uniform(min: number, max: number, random: RandomSource = defaultRandom): number {
  return min + random() * (max - min);
}

export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.min(Math.floor(random() * (i + 1)), i);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
