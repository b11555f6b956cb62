import { randomInt } from "node:crypto";
import seedrandom from "seedrandom";
import type { RandomnessProvider } from "./types";

// `randomInt` accepts at most 2^48 - 1 between its bounds
const RANDOM_INT_SPAN = 2 ** 47;
const WIDE_SPAN = 2 ** 53;

/**
 * Uniform integers from the platform CSPRNG. Spans wider than `randomInt`
 * takes are drawn as 53 bits from two calls, rejecting the biased tail.
 */
export const cryptoRandomness: RandomnessProvider = {
  next(min: number, max: number): number {
    if (min === max) return min;

    const span = max - min + 1;
    if (span <= RANDOM_INT_SPAN) return randomInt(min, max + 1);
    if (span > WIDE_SPAN) {
      throw new RangeError(`Cannot draw from a range of ${span} integers`);
    }

    const limit = Math.floor(WIDE_SPAN / span) * span;
    let draw: number;
    do {
      draw = randomInt(0, WIDE_SPAN / RANDOM_INT_SPAN) * RANDOM_INT_SPAN + randomInt(0, RANDOM_INT_SPAN);
    } while (draw >= limit);

    return min + (draw % span);
  },
};

/** A reproducible stream of integers for a given seed. */
export function seededRandomness(seed: string): RandomnessProvider {
  const rng = seedrandom(seed);
  return {
    next(min: number, max: number): number {
      return min + Math.floor(rng() * (max - min + 1));
    },
  };
}

/**
 * Replays `values` in order, starting over once exhausted.
 * A value outside the requested range is clamped into it.
 */
export function sequenceRandomness(values: readonly number[]): RandomnessProvider {
  if (values.length === 0) {
    throw new RangeError("sequenceRandomness needs at least one value");
  }

  let index = 0;
  return {
    next(min: number, max: number): number {
      const value = values[index % values.length];
      index++;
      return Math.min(max, Math.max(min, value));
    },
  };
}

let defaultRandomness: RandomnessProvider = cryptoRandomness;

/** Sets the provider used by dice created without one. */
export function setDefaultRandomness(provider: RandomnessProvider): void {
  defaultRandomness = provider;
}

export function getDefaultRandomness(): RandomnessProvider {
  return defaultRandomness;
}
