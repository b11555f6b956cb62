import { afterEach, describe, expect, it } from "vitest";
import {
  SidedDie,
  cryptoRandomness,
  getDefaultRandomness,
  parse,
  seededRandomness,
  sequenceRandomness,
  setDefaultRandomness,
} from "../src/index";

describe("randomness providers", () => {
  afterEach(() => {
    setDefaultRandomness(cryptoRandomness);
  });

  it("cryptoRandomness stays within the inclusive range", () => {
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i++) {
      const value = cryptoRandomness.next(-2, 2);
      expect(value).toBeGreaterThanOrEqual(-2);
      expect(value).toBeLessThanOrEqual(2);
      seen.add(value);
    }
    expect(seen.size).toBe(5);
  });

  it("cryptoRandomness returns the bound of a single-value range", () => {
    expect(cryptoRandomness.next(4, 4)).toBe(4);
  });

  it("cryptoRandomness draws from ranges wider than 2^48", () => {
    for (const max of [300_000_000_000_000, Number.MAX_SAFE_INTEGER]) {
      for (let i = 0; i < 100; i++) {
        const value = cryptoRandomness.next(1, max);
        expect(Number.isSafeInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(1);
        expect(value).toBeLessThanOrEqual(max);
      }
    }
  });

  it("rolls a die with more sides than randomInt takes", () => {
    const rollable = parse("D300000000000000");
    const { value } = rollable.roll();

    expect(value).toBeGreaterThanOrEqual(1);
    expect(value).toBeLessThanOrEqual(300_000_000_000_000);
  });

  it("seededRandomness repeats for the same seed", () => {
    const first = seededRandomness("test-seed");
    const second = seededRandomness("test-seed");

    const a = Array.from({ length: 20 }, () => first.next(1, 20));
    const b = Array.from({ length: 20 }, () => second.next(1, 20));

    expect(a).toEqual(b);
    for (const value of a) {
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(20);
    }
  });

  it("sequenceRandomness cycles and clamps", () => {
    const provider = sequenceRandomness([2, 9, 0]);

    expect(provider.next(1, 6)).toBe(2);
    expect(provider.next(1, 6)).toBe(6);
    expect(provider.next(1, 6)).toBe(1);
    expect(provider.next(1, 6)).toBe(2);
  });

  it("sequenceRandomness needs values", () => {
    expect(() => sequenceRandomness([])).toThrow(RangeError);
  });

  it("setDefaultRandomness applies to dice created without a provider", () => {
    const die = new SidedDie(6);
    setDefaultRandomness(sequenceRandomness([4]));

    expect(getDefaultRandomness()).not.toBe(cryptoRandomness);
    expect(die.roll().value).toBe(4);
  });
});
