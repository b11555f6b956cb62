import { describe, expect, it } from "vitest";
import {
  Arithmetic,
  Cup,
  CustomDie,
  DiceRollerError,
  DropKeep,
  Explode,
  InvalidDie,
  SidedDie,
  parse,
} from "../src/index";
import type { DiceRollerErrorKind } from "../src/index";

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("errors", () => {
  const failures: [DiceRollerErrorKind, () => unknown][] = [
    ["InvalidDie", () => new SidedDie(1)],
    ["InvalidDie", () => new CustomDie([])],
    ["InvalidPool", () => Cup.fromRollable(new SidedDie(6), 0)],
    ["UnknownOperator", () => new Arithmetic(new SidedDie(6), "%", 1)],
    ["InvalidOperand", () => new Arithmetic(new SidedDie(6), "/", 0)],
    ["UnknownAlgorithm", () => new DropKeep(new SidedDie(6), "KX", 1)],
    ["TooManyDropped", () => new DropKeep(new SidedDie(6), "DL", 2)],
    ["UnknownComparator", () => new Explode(new SidedDie(6), "!", 3)],
    ["InfiniteLoop", () => new Explode(new SidedDie(6), ">", 1)],
    ["SyntaxError", () => parse("D6$")],
  ];

  it.each(failures)("reports %s", (kind, fn) => {
    const error = capture(fn);

    expect(error).toBeInstanceOf(DiceRollerError);
    expect(error).toBeInstanceOf(Error);
    if (!(error instanceof DiceRollerError)) return;
    expect(error.kind).toBe(kind);
    expect(error.name).toBe(kind);
  });

  it("describes the offending value", () => {
    expect(() => new SidedDie(1)).toThrow("A die must have at least 2 sides, 1 given");
    expect(() => new CustomDie([1, 0.5])).toThrow(InvalidDie);
    expect(() => new DropKeep(new SidedDie(6), "DL", 2)).toThrow(
      "The threshold must be between 0 and the pool size 1, 2 given"
    );
  });
});
