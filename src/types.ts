/** The evaluation call that produced a roll. */
export type RollMethod = "roll" | "minimum" | "maximum";

/** Where a roll comes from: the node that computed it and how. */
export interface RollSource {
  readonly rollable: Rollable;
  readonly method: RollMethod;
}

/**
 * The outcome of one evaluation call.
 *
 * `operation` shows how `value` was derived, e.g. `3 + 2 + (-1)`.
 */
export interface Roll {
  readonly value: number;
  readonly operation: string;
  readonly source: RollSource;
}

/** Any node of a dice expression tree. */
export interface Rollable {
  /** Lowest possible result, computed without randomness. */
  minimum(): number;
  /** Highest possible result, computed without randomness. */
  maximum(): number;
  roll(): Roll;
  /** Canonical textual form, parseable back into an equivalent tree. */
  notation(): string;
  /** Operation text of the last `minimum`, `maximum` or `roll` call. */
  getTrace(): string;
  /** Independent deep copy of this node and its children. */
  clone(): Rollable;
  toJSON(): string;
}

/** A rollable that decorates another one. */
export interface Modifier extends Rollable {
  getInnerRollable(): Rollable;
}

/** An ordered collection of rollables whose results are summed. */
export interface Pool extends Rollable, Iterable<Rollable> {
  readonly size: number;
  isEmpty(): boolean;
}

/** Receives every roll produced by the nodes it is attached to. */
export interface Tracer {
  append(roll: Roll): void;
}

export interface SupportsTracing {
  setTracer(tracer: Tracer): void;
  getTracer(): Tracer;
}

/** Source of integers for dice. `next` is inclusive on both ends. */
export interface RandomnessProvider {
  next(min: number, max: number): number;
}
