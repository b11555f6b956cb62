import { Cup } from "./cup";
import { CustomDie, FudgeDie, PercentileDie, SidedDie } from "./dice";
import { Arithmetic } from "./modifier/arithmetic";
import { DropKeep } from "./modifier/drop-keep";
import { Explode } from "./modifier/explode";
import type { DieNode, ExpressionNode } from "./parser/nodes";
import { parseExpression } from "./parser/parser";
import { TraceableRollable } from "./rollable";
import type { RandomnessProvider, Roll, Rollable, Tracer } from "./types";

export type FactoryOptions = {
  /** Provider for every die; the library default when omitted. */
  randomness?: RandomnessProvider;
  /** Attached to every node of the built tree. */
  tracer?: Tracer;
};

/**
 * Parse a dice notation into a rollable tree.
 *
 * Syntax problems throw `NotationSyntaxError`; constraint violations found
 * while building the nodes (e.g. `InfiniteLoop`) propagate as thrown by the
 * node constructors.
 *
 * @example
 * parse("4D6DH1").roll().value   // 4d6, highest die dropped
 * parse("3D20+4+D4!>3/4^3")     // two terms summed
 */
export function parse(notation: string, options: FactoryOptions = {}): TraceableRollable {
  return build(parseExpression(notation), options);
}

/** Parse a notation and roll it once. */
export function roll(notation: string, options: FactoryOptions = {}): Roll {
  return parse(notation, options).roll();
}

/**
 * Turn an expression tree into fresh rollable nodes. The tracer is attached
 * once the whole tree exists, so validation done by constructors is not
 * recorded.
 */
export function build(node: ExpressionNode, options: FactoryOptions = {}): TraceableRollable {
  const rollable = buildNode(node, options.randomness);
  if (options.tracer) attachTracer(rollable, options.tracer);
  return rollable;
}

function buildNode(node: ExpressionNode, randomness?: RandomnessProvider): TraceableRollable {
  switch (node.type) {
    case "group": {
      if (node.count === 1) return createDie(node.die, randomness);
      return new Cup(...createDice(node.die, node.count, randomness));
    }

    case "sum": {
      // dice groups are spread into the sum so that `2D3+D4` holds three dice
      const items = node.children.flatMap((child) =>
        child.type === "group"
          ? createDice(child.die, child.count, randomness)
          : [buildNode(child, randomness)]
      );
      return new Cup(...items);
    }

    case "pool":
      return buildNode(node.child, randomness);

    case "dropKeep":
      return new DropKeep(buildNode(node.child, randomness), node.algorithm, node.threshold);

    case "explode":
      return new Explode(buildNode(node.child, randomness), node.comparator, node.threshold);

    case "arithmetic":
      return new Arithmetic(buildNode(node.child, randomness), node.operator, node.operand);
  }
}

function createDice(die: DieNode, count: number, randomness?: RandomnessProvider): TraceableRollable[] {
  return Array.from({ length: count }, () => createDie(die, randomness));
}

function createDie(die: DieNode, randomness?: RandomnessProvider): TraceableRollable {
  switch (die.type) {
    case "sided":
      return new SidedDie(die.sides, randomness);
    case "custom":
      return new CustomDie(die.faces, randomness);
    case "fudge":
      return new FudgeDie(randomness);
    case "percentile":
      return new PercentileDie(randomness);
  }
}

/** Sets `tracer` on a node and every node below it. */
export function attachTracer(rollable: Rollable, tracer: Tracer): void {
  if (rollable instanceof TraceableRollable) rollable.setTracer(tracer);

  if (rollable instanceof Cup) {
    for (const child of rollable) attachTracer(child, tracer);
  } else if (
    rollable instanceof Arithmetic ||
    rollable instanceof DropKeep ||
    rollable instanceof Explode
  ) {
    attachTracer(rollable.getInnerRollable(), tracer);
  }
}
