import { clampResult, formatValue, isPlainGroup, wrapOperand } from "../common/format";
import { OPERATORS } from "../common/types";
import type { Operator } from "../common/types";
import { InvalidOperand, UnknownOperator } from "../errors";
import { TraceableRollable } from "../rollable";
import type { Modifier, Roll, Rollable } from "../types";
import { DropKeep } from "./drop-keep";
import { Explode } from "./explode";

/** Chained arithmetic suffixes a single dice term accepts. */
export const MAX_ARITHMETIC_CHAIN = 2;

function toOperator(operator: string): Operator {
  const found = OPERATORS.find((candidate) => candidate === operator);
  if (found === undefined) throw new UnknownOperator(operator);
  return found;
}

function apply(operator: Operator, value: number, operand: number): number {
  switch (operator) {
    case "+":
      return clampResult(value + operand);
    case "-":
      return clampResult(value - operand);
    case "*":
      return clampResult(value * operand);
    case "/":
      return clampResult(Math.trunc(value / operand));
    case "^":
      return clampResult(value ** operand);
  }
}

/**
 * Applies `operator operand` to the result of the wrapped rollable using
 * integer semantics: `/` truncates toward zero and `^` is a power.
 */
export class Arithmetic extends TraceableRollable implements Modifier {
  static readonly ADD = "+";
  static readonly SUB = "-";
  static readonly MUL = "*";
  static readonly DIV = "/";
  static readonly EXP = "^";

  readonly operator: Operator;

  constructor(
    private readonly rollable: Rollable,
    operator: string,
    readonly operand: number
  ) {
    super();
    this.operator = toOperator(operator);

    if (!Number.isSafeInteger(operand) || operand < 0) {
      throw InvalidOperand.dueToValue(operand);
    }

    if (this.operator === "/" && operand === 0) {
      throw InvalidOperand.dueToDivisionByZero();
    }
  }

  getInnerRollable(): Rollable {
    return this.rollable;
  }

  minimum(): number {
    const [input, value] = this.bound((a, b) => a < b);
    return this.record(value, this.describe(formatValue(input)), "minimum").value;
  }

  maximum(): number {
    const [input, value] = this.bound((a, b) => a > b);
    return this.record(value, this.describe(formatValue(input)), "maximum").value;
  }

  roll(): Roll {
    const inner = this.rollable.roll();
    const value = apply(this.operator, inner.value, this.operand);
    return this.record(value, this.describe(wrapOperand(inner.operation)), "roll");
  }

  notation(): string {
    const inner = this.rollable.notation();
    return `${this.keepsGrouping() ? inner : `(${inner})`}${this.operator}${this.operand}`;
  }

  clone(): Arithmetic {
    return this.withSameTracer(new Arithmetic(this.rollable.clone(), this.operator, this.operand));
  }

  /** Length of the arithmetic chain ending at this modifier. */
  chainLength(): number {
    return this.rollable instanceof Arithmetic ? this.rollable.chainLength() + 1 : 1;
  }

  private describe(input: string): string {
    return `${input} ${this.operator} ${this.operand}`;
  }

  /**
   * Picks the inner value giving the extreme result. The inner bounds are
   * always candidates; zero joins them for `^` when the range spans it.
   */
  private bound(better: (a: number, b: number) => boolean): [number, number] {
    const min = this.rollable.minimum();
    const max = this.rollable.maximum();
    const candidates = [min, max];
    if (this.operator === "^" && min < 0 && max > 0) candidates.push(0);

    let best: [number, number] = [min, apply(this.operator, min, this.operand)];
    for (const candidate of candidates) {
      const result = apply(this.operator, candidate, this.operand);
      if (better(result, best[1])) best = [candidate, result];
    }

    return best;
  }

  /** Whether the inner notation can be suffixed without parentheses. */
  private keepsGrouping(): boolean {
    const inner = this.rollable;
    if (inner instanceof Arithmetic) return inner.chainLength() < MAX_ARITHMETIC_CHAIN;
    // `D6!>-2` would read the operand as a negative explode threshold
    if (inner instanceof Explode) {
      return !(this.operator === "-" && inner.comparator !== "=" && inner.threshold === undefined);
    }
    if (inner instanceof DropKeep) return true;
    return isPlainGroup(inner.notation());
  }
}
