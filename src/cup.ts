import { isPlainGroup, sum, wrapSummand } from "./common/format";
import { InvalidPool } from "./errors";
import { TraceableRollable } from "./rollable";
import type { Pool, Roll, Rollable } from "./types";

/**
 * An ordered pool of rollables whose results are added together.
 *
 * The cup owns its children; `fromRollable` fills the extra slots with
 * clones rather than repeating one instance.
 *
 * An empty cup renders as `0`, which the parser does not accept: only
 * trees without empty cups can be rebuilt from their notation.
 */
export class Cup extends TraceableRollable implements Pool {
  private readonly items: readonly Rollable[];

  constructor(...items: Rollable[]) {
    super();
    this.items = items;
  }

  static fromRollable(rollable: Rollable, count: number): Cup {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw InvalidPool.dueToCount(count);
    }

    const items: Rollable[] = [rollable];
    for (let i = 1; i < count; i++) items.push(rollable.clone());

    return new Cup(...items);
  }

  /** A new cup holding these children followed by `rollables`. */
  withAddedRollable(...rollables: Rollable[]): Cup {
    return this.withSameTracer(new Cup(...this.items, ...rollables));
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  [Symbol.iterator](): Iterator<Rollable> {
    return this.items[Symbol.iterator]();
  }

  minimum(): number {
    const values = this.items.map((item) => item.minimum());
    return this.record(sum(values), joinValues(values), "minimum").value;
  }

  maximum(): number {
    const values = this.items.map((item) => item.maximum());
    return this.record(sum(values), joinValues(values), "maximum").value;
  }

  roll(): Roll {
    const rolls = this.items.map((item) => item.roll());
    const operation =
      rolls.length === 0 ? "0" : rolls.map((roll) => wrapSummand(roll.operation)).join(" + ");

    return this.record(
      sum(rolls.map((roll) => roll.value)),
      operation,
      "roll"
    );
  }

  notation(): string {
    if (this.items.length === 0) return "0";

    const parts: string[] = [];
    let previous = "";
    let count = 0;

    const flush = () => {
      if (count > 1) parts.push(`${count}${previous}`);
      else if (count === 1) parts.push(previous);
    };

    for (const item of this.items) {
      // a nested pool keeps its parentheses so it is not spread on re-parse
      const notation = item instanceof Cup && item.size > 1 ? `(${item.notation()})` : item.notation();
      // only single dice collapse: `2D6` twice must stay `2D6+2D6`
      if (notation === previous && notation.startsWith("D") && isPlainGroup(notation)) {
        count++;
        continue;
      }
      flush();
      previous = notation;
      count = 1;
    }
    flush();

    return parts.join("+");
  }

  clone(): Cup {
    return this.withSameTracer(new Cup(...this.items.map((item) => item.clone())));
  }
}

function joinValues(values: readonly number[]): string {
  if (values.length === 0) return "0";
  return values.map((value) => wrapSummand(`${value}`)).join(" + ");
}
