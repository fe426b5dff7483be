export type RandomFn = () => number;

export function randInRange(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

export function randInt(random: RandomFn, minInclusive: number, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(randInRange(random, minInclusive, maxExclusive)));
}

export function pickRandom<T>(random: RandomFn, list: readonly T[]): T {
  const index = randInt(random, 0, list.length);
  const item = list[index];
  if (item === undefined) {
    throw new RangeError("pickRandom called with an empty list");
  }
  return item;
}
