/**
 * Source of uniformly distributed numbers in [0, 1).
 * Every random decision in the governor draws from one of these so tests can pin them.
 */
type RandomSource = {
  next(): number;
};

const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32: small, fast and good enough for jitter.
 */
function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Replays the given values in order, then repeats the last one.
 */
function createSequenceRandom(values: readonly number[]): RandomSource {
  let index = 0;

  return {
    next: () => {
      const value = values[Math.min(index, values.length - 1)] ?? 0;
      index += 1;
      return value;
    },
  };
}

function uniform(random: RandomSource, min: number, max: number): number {
  if (max <= min) {
    return min;
  }
  return min + random.next() * (max - min);
}

function chance(random: RandomSource, probability: number): boolean {
  if (probability <= 0) {
    return false;
  }
  return random.next() < probability;
}

function randomSeed(random: RandomSource): number {
  return Math.floor(random.next() * 0x7fffffff);
}

export type { RandomSource };
export {
  systemRandom,
  createSeededRandom,
  createSequenceRandom,
  uniform,
  chance,
  randomSeed,
};
