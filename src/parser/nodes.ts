import type { Algorithm, Comparator, Operator } from "../common/types";

export type ExpressionNode =
  | GroupNode
  | SumNode
  | PoolNode
  | DropKeepNode
  | ExplodeNode
  | ArithmeticNode;

export type DieNode =
  | { readonly type: "sided"; readonly sides: number }
  | { readonly type: "custom"; readonly faces: readonly number[] }
  | { readonly type: "fudge" }
  | { readonly type: "percentile" };

/// `count` dice of one kind, e.g. `4D6`.
export type GroupNode = {
  readonly type: "group";
  readonly count: number;
  readonly die: DieNode;
};

/// Terms joined by `+`, e.g. `2D6+D4`.
export type SumNode = {
  readonly type: "sum";
  readonly children: readonly ExpressionNode[];
};

/// A parenthesized expression; stays a single child of an enclosing sum.
export type PoolNode = {
  readonly type: "pool";
  readonly child: ExpressionNode;
};

export type DropKeepNode = {
  readonly type: "dropKeep";
  readonly algorithm: Algorithm;
  readonly threshold: number;
  readonly child: ExpressionNode;
};

export type ExplodeNode = {
  readonly type: "explode";
  readonly comparator: Comparator;
  readonly threshold?: number;
  readonly child: ExpressionNode;
};

export type ArithmeticNode = {
  readonly type: "arithmetic";
  readonly operator: Operator;
  readonly operand: number;
  readonly child: ExpressionNode;
};
