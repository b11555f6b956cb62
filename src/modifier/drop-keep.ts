import { formatValue, sum, wrapNotation } from "../common/format";
import { ALGORITHMS } from "../common/types";
import type { Algorithm } from "../common/types";
import { Cup } from "../cup";
import { InvalidPool, TooManyDropped, UnknownAlgorithm } from "../errors";
import { TraceableRollable } from "../rollable";
import type { Modifier, Roll, Rollable, RollMethod } from "../types";

function toAlgorithm(algorithm: string): Algorithm {
  const code = algorithm.toUpperCase();
  const found = ALGORITHMS.find((candidate) => candidate === code);
  if (found === undefined) throw new UnknownAlgorithm(algorithm);
  return found;
}

/**
 * Returns the values retained by `algorithm`, in ascending order.
 * The sort is stable so equal values keep their roll order.
 */
export function select(values: readonly number[], algorithm: Algorithm, threshold: number): number[] {
  const sorted = [...values].sort((a, b) => a - b);

  switch (algorithm) {
    case "DH":
      return sorted.slice(0, sorted.length - threshold);
    case "DL":
      return sorted.slice(threshold);
    case "KH":
      return sorted.slice(sorted.length - threshold);
    case "KL":
      return sorted.slice(0, threshold);
  }
}

/**
 * Drops or keeps the highest or lowest results of a pool.
 * A bare rollable is wrapped into a one-element cup.
 */
export class DropKeep extends TraceableRollable implements Modifier {
  static readonly DROP_HIGHEST = "DH";
  static readonly DROP_LOWEST = "DL";
  static readonly KEEP_HIGHEST = "KH";
  static readonly KEEP_LOWEST = "KL";

  readonly algorithm: Algorithm;
  private readonly pool: Cup;
  private readonly wrapped: Rollable | undefined;

  constructor(
    rollable: Rollable,
    algorithm: string,
    readonly threshold: number
  ) {
    super();
    this.algorithm = toAlgorithm(algorithm);

    if (rollable instanceof Cup) {
      this.pool = rollable;
      this.wrapped = undefined;
    } else {
      this.pool = new Cup(rollable);
      this.wrapped = rollable;
    }

    if (this.pool.isEmpty()) {
      throw InvalidPool.dueToEmptyPool("drop/keep");
    }

    if (!Number.isSafeInteger(threshold) || threshold < 0 || threshold > this.pool.size) {
      throw new TooManyDropped(threshold, this.pool.size);
    }
  }

  getInnerRollable(): Rollable {
    return this.wrapped ?? this.pool;
  }

  minimum(): number {
    return this.decorate(this.children().map((child) => child.minimum()), "minimum").value;
  }

  maximum(): number {
    return this.decorate(this.children().map((child) => child.maximum()), "maximum").value;
  }

  roll(): Roll {
    return this.decorate(this.children().map((child) => child.roll().value), "roll");
  }

  notation(): string {
    return `${wrapNotation(this.pool.notation())}${this.algorithm}${this.threshold}`;
  }

  clone(): DropKeep {
    const inner = this.getInnerRollable().clone();
    return this.withSameTracer(new DropKeep(inner, this.algorithm, this.threshold));
  }

  private children(): Rollable[] {
    return [...this.pool];
  }

  private decorate(values: readonly number[], method: RollMethod): Roll {
    const kept = select(values, this.algorithm, this.threshold);
    const operation = kept.length === 0 ? "0" : kept.map(formatValue).join(" + ");
    return this.record(sum(kept), operation, method);
  }
}
