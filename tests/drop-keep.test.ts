import { describe, expect, it } from "vitest";
import {
  Cup,
  CustomDie,
  DropKeep,
  InvalidPool,
  MemoryTracer,
  SidedDie,
  TooManyDropped,
  UnknownAlgorithm,
  attachTracer,
  sequenceRandomness,
} from "../src/index";

function fourD6(values: number[]): Cup {
  return Cup.fromRollable(new SidedDie(6, sequenceRandomness(values)), 4);
}

describe("DropKeep", () => {
  const cases: [string, number, number, string][] = [
    ["DH", 1, 10, "1 + 3 + 6"],
    ["DL", 1, 15, "3 + 6 + 6"],
    ["KH", 2, 12, "6 + 6"],
    ["KL", 2, 4, "1 + 3"],
  ];

  it.each(cases)("%s%s sums the retained dice", (algorithm, threshold, value, operation) => {
    const modifier = new DropKeep(fourD6([3, 6, 1, 6]), algorithm, threshold);
    const roll = modifier.roll();

    expect(roll.value).toBe(value);
    expect(roll.operation).toBe(operation);
  });

  it("accepts lowercase algorithm codes", () => {
    const modifier = new DropKeep(fourD6([1]), "kh", 3);
    expect(modifier.algorithm).toBe("KH");
    expect(modifier.notation()).toBe("4D6KH3");
  });

  it("never keeps the highest rolls when dropping highest", () => {
    const tracer = new MemoryTracer();
    const pool = Cup.fromRollable(new SidedDie(10), 5);
    attachTracer(pool, tracer);
    const modifier = new DropKeep(pool, "DH", 2);

    for (let i = 0; i < 200; i++) {
      tracer.clear();
      const roll = modifier.roll();
      const dice = tracer
        .all()
        .filter((record) => record.source.rollable instanceof SidedDie)
        .map((record) => record.value)
        .sort((a, b) => a - b);

      expect(dice).toHaveLength(5);
      expect(roll.value).toBe(dice[0] + dice[1] + dice[2]);
      expect(roll.operation.split(" + ")).toHaveLength(3);
    }
  });

  it("keeps threshold values when keeping", () => {
    const modifier = new DropKeep(Cup.fromRollable(new SidedDie(6), 6), "KL", 4);
    for (let i = 0; i < 100; i++) {
      expect(modifier.roll().operation.split(" + ")).toHaveLength(4);
    }
  });

  it("evaluates to zero when every die is dropped", () => {
    const roll = new DropKeep(fourD6([2]), "DL", 4).roll();
    expect(roll.value).toBe(0);
    expect(roll.operation).toBe("0");
  });

  it("parenthesizes negative values in its operation", () => {
    const pool = new Cup(new CustomDie([-2]), new CustomDie([3]));
    const roll = new DropKeep(pool, "KH", 2).roll();

    expect(roll.value).toBe(1);
    expect(roll.operation).toBe("(-2) + 3");
  });

  describe("bounds", () => {
    it("filters the children bounds", () => {
      const modifier = new DropKeep(Cup.fromRollable(new SidedDie(6), 4), "DH", 1);
      expect(modifier.minimum()).toBe(3);
      expect(modifier.maximum()).toBe(18);
    });

    it("filters each bound vector independently", () => {
      const pool = new Cup(new CustomDie([-5, 5]), new SidedDie(6));
      const modifier = new DropKeep(pool, "KH", 1);

      expect(modifier.minimum()).toBe(1);
      expect(modifier.maximum()).toBe(6);
      expect(modifier.getTrace()).toBe("6");
    });
  });

  describe("validation", () => {
    it("rejects unknown algorithms", () => {
      expect(() => new DropKeep(fourD6([1]), "XX", 1)).toThrow(UnknownAlgorithm);
    });

    it.each([5, -1])("rejects a threshold of %s for four dice", (threshold) => {
      expect(() => new DropKeep(fourD6([1]), "DH", threshold)).toThrow(TooManyDropped);
    });

    it("rejects an empty pool", () => {
      expect(() => new DropKeep(new Cup(), "KH", 0)).toThrow(InvalidPool);
    });
  });

  describe("wrapping", () => {
    it("wraps a single rollable and unwraps it again", () => {
      const die = new SidedDie(20);
      const modifier = new DropKeep(die, "KH", 1);

      expect(modifier.getInnerRollable()).toBe(die);
      expect(modifier.notation()).toBe("D20KH1");
    });

    it("returns a wrapped cup as is", () => {
      const pool = fourD6([1]);
      expect(new DropKeep(pool, "DL", 1).getInnerRollable()).toBe(pool);
    });

    it("parenthesizes a mixed pool", () => {
      const pool = new Cup(new SidedDie(6), new SidedDie(4));
      expect(new DropKeep(pool, "KL", 1).notation()).toBe("(D6+D4)KL1");
    });
  });
});
