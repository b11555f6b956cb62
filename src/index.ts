export type {
  Modifier,
  Pool,
  RandomnessProvider,
  Roll,
  Rollable,
  RollMethod,
  RollSource,
  SupportsTracing,
  Tracer,
} from "./types";
export type { Algorithm, Comparator, Operator } from "./common/types";
export { MAX_RESULT, MIN_RESULT } from "./common/types";

export { CustomDie, FudgeDie, PercentileDie, SidedDie } from "./dice";
export { Cup } from "./cup";
export { Arithmetic, MAX_ARITHMETIC_CHAIN } from "./modifier/arithmetic";
export { DropKeep } from "./modifier/drop-keep";
export { Explode } from "./modifier/explode";
export { TraceableRollable } from "./rollable";

export {
  DiceRollerError,
  InfiniteLoop,
  InvalidDie,
  InvalidOperand,
  InvalidPool,
  NotationSyntaxError,
  TooManyDropped,
  UnknownAlgorithm,
  UnknownComparator,
  UnknownOperator,
} from "./errors";
export type { DiceRollerErrorKind } from "./errors";

export { attachTracer, build, parse, roll } from "./factory";
export type { FactoryOptions } from "./factory";
export {
  clearParserCache,
  getCachingEnabled,
  getParserCacheSize,
  parseExpression,
  setCachingEnabled,
} from "./parser/parser";
export type {
  ArithmeticNode,
  DieNode,
  DropKeepNode,
  ExplodeNode,
  ExpressionNode,
  GroupNode,
  PoolNode,
  SumNode,
} from "./parser/nodes";

export {
  cryptoRandomness,
  getDefaultRandomness,
  seededRandomness,
  sequenceRandomness,
  setDefaultRandomness,
} from "./random";

export { DEFAULT_TRACE_FORMAT, LogTracer, MemoryTracer, NullTracer, formatRoll } from "./tracer";
export { getLogger, setLogger } from "./common/logger";
export type { Logger, LogLevel } from "./common/logger";
export { LRUCache } from "./common/lru-cache";
