import { MAX_RESULT } from "../common/types";
import type { Comparator } from "../common/types";
import { COMPARATORS } from "../common/types";
import { clampResult, sum, wrapNotation, wrapSummand } from "../common/format";
import { Cup } from "../cup";
import { InfiniteLoop, InvalidPool, UnknownComparator } from "../errors";
import { TraceableRollable } from "../rollable";
import type { Modifier, Roll, Rollable } from "../types";

function toComparator(comparator: string): Comparator {
  const found = COMPARATORS.find((candidate) => candidate === comparator);
  if (found === undefined) throw new UnknownComparator(comparator);
  return found;
}

function matches(comparator: Comparator, value: number, threshold: number): boolean {
  switch (comparator) {
    case "=":
      return value === threshold;
    case ">":
      return value > threshold;
    case "<":
      return value < threshold;
  }
}

/** Whether every result in `[min, max]` could trigger another roll. */
function loopsForever(comparator: Comparator, threshold: number, min: number, max: number): boolean {
  switch (comparator) {
    case "=":
      return threshold === max && min === max;
    case ">":
      return threshold <= min;
    case "<":
      return threshold >= max;
  }
}

/**
 * Re-rolls each die of a pool and adds the new result for as long as the
 * result matches the comparator. Without a threshold a die explodes on its
 * own maximum.
 *
 * Unsafe combinations are rejected up front, checked against the bounds of
 * the whole pool and of each die, so rolling always terminates.
 */
export class Explode extends TraceableRollable implements Modifier {
  static readonly EQ = "=";
  static readonly GT = ">";
  static readonly LT = "<";

  readonly comparator: Comparator;
  private readonly pool: Cup;
  private readonly wrapped: Rollable | undefined;
  private readonly triggers: readonly { rollable: Rollable; threshold: number }[];

  constructor(
    rollable: Rollable,
    comparator: string,
    readonly threshold?: number
  ) {
    super();
    this.comparator = toComparator(comparator);

    if (rollable instanceof Cup) {
      this.pool = rollable;
      this.wrapped = undefined;
    } else {
      this.pool = new Cup(rollable);
      this.wrapped = rollable;
    }

    if (this.pool.isEmpty()) {
      throw InvalidPool.dueToEmptyPool("explode");
    }

    const min = this.pool.minimum();
    const max = this.pool.maximum();
    if (loopsForever(this.comparator, threshold ?? max, min, max)) {
      throw new InfiniteLoop(this.notation());
    }

    this.triggers = [...this.pool].map((child) => {
      const childMin = child.minimum();
      const childMax = child.maximum();
      const childThreshold = threshold ?? childMax;
      if (loopsForever(this.comparator, childThreshold, childMin, childMax)) {
        throw new InfiniteLoop(this.notation());
      }
      return { rollable: child, threshold: childThreshold };
    });
  }

  getInnerRollable(): Rollable {
    return this.wrapped ?? this.pool;
  }

  minimum(): number {
    const values = this.triggers.map(({ rollable }) => rollable.minimum());
    const operation = values.map((value) => wrapSummand(`${value}`)).join(" + ");
    return this.record(sum(values), operation, "minimum").value;
  }

  maximum(): number {
    return this.record(MAX_RESULT, `${MAX_RESULT}`, "maximum").value;
  }

  roll(): Roll {
    let total = 0;
    const operations: string[] = [];

    for (const { rollable, threshold } of this.triggers) {
      let result: Roll;
      do {
        result = rollable.roll();
        total = clampResult(total + result.value);
        operations.push(wrapSummand(result.operation));
      } while (matches(this.comparator, result.value, threshold));
    }

    return this.record(total, operations.join(" + "), "roll");
  }

  notation(): string {
    let suffix = "!";
    if (this.comparator !== "=" || this.threshold !== undefined) suffix += this.comparator;
    if (this.threshold !== undefined) suffix += `${this.threshold}`;

    return `${wrapNotation(this.pool.notation())}${suffix}`;
  }

  clone(): Explode {
    const inner = this.getInnerRollable().clone();
    return this.withSameTracer(new Explode(inner, this.comparator, this.threshold));
  }
}
