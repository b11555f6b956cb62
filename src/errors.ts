export type DiceRollerErrorKind =
  | "InvalidDie"
  | "InvalidPool"
  | "UnknownOperator"
  | "InvalidOperand"
  | "UnknownAlgorithm"
  | "TooManyDropped"
  | "UnknownComparator"
  | "InfiniteLoop"
  | "SyntaxError";

/**
 * Base class of every error the library throws.
 *
 * Errors only ever come out of constructors and the parser; evaluating a tree
 * that was built successfully does not throw.
 */
export class DiceRollerError extends Error {
  constructor(
    readonly kind: DiceRollerErrorKind,
    message: string
  ) {
    super(message);
    this.name = kind;
  }
}

export class InvalidDie extends DiceRollerError {
  constructor(message: string) {
    super("InvalidDie", message);
  }

  static dueToSideCount(sides: number): InvalidDie {
    return new InvalidDie(`A die must have at least 2 sides, ${sides} given`);
  }

  static dueToMissingFaces(): InvalidDie {
    return new InvalidDie("A custom die must have at least one face");
  }

  static dueToInvalidFace(face: number): InvalidDie {
    return new InvalidDie(`Die faces must be safe integers, ${face} given`);
  }
}

export class InvalidPool extends DiceRollerError {
  constructor(message: string) {
    super("InvalidPool", message);
  }

  static dueToCount(count: number): InvalidPool {
    return new InvalidPool(`The number of rollables must be a positive integer, ${count} given`);
  }

  static dueToEmptyPool(modifier: string): InvalidPool {
    return new InvalidPool(`The ${modifier} modifier cannot wrap an empty pool`);
  }
}

export class UnknownOperator extends DiceRollerError {
  constructor(operator: string) {
    super("UnknownOperator", `The operator \`${operator}\` is not supported`);
  }
}

export class InvalidOperand extends DiceRollerError {
  constructor(message: string) {
    super("InvalidOperand", message);
  }

  static dueToValue(operand: number): InvalidOperand {
    return new InvalidOperand(`The operand must be a non-negative integer, ${operand} given`);
  }

  static dueToDivisionByZero(): InvalidOperand {
    return new InvalidOperand("Division by zero is not allowed");
  }
}

export class UnknownAlgorithm extends DiceRollerError {
  constructor(algorithm: string) {
    super("UnknownAlgorithm", `The algorithm \`${algorithm}\` is not supported`);
  }
}

export class TooManyDropped extends DiceRollerError {
  constructor(threshold: number, size: number) {
    super(
      "TooManyDropped",
      `The threshold must be between 0 and the pool size ${size}, ${threshold} given`
    );
  }
}

export class UnknownComparator extends DiceRollerError {
  constructor(comparator: string) {
    super("UnknownComparator", `The comparator \`${comparator}\` is not supported`);
  }
}

export class InfiniteLoop extends DiceRollerError {
  constructor(notation: string) {
    super("InfiniteLoop", `The expression \`${notation}\` would explode forever`);
  }
}

/** The notation does not match the grammar. `fragment` is the offending part. */
export class NotationSyntaxError extends DiceRollerError {
  constructor(
    message: string,
    readonly fragment: string
  ) {
    super("SyntaxError", message);
  }

  static dueToUnexpectedToken(fragment: string, expression: string): NotationSyntaxError {
    return new NotationSyntaxError(
      `Unexpected token \`${fragment}\` in expression \`${expression}\``,
      fragment
    );
  }

  static dueToTooManyArithmetic(fragment: string, expression: string): NotationSyntaxError {
    return new NotationSyntaxError(
      `At most two arithmetic modifiers may follow a dice group, found \`${fragment}\` in expression \`${expression}\``,
      fragment
    );
  }

  static dueToOutOfRange(fragment: string, expression: string, reason: string): NotationSyntaxError {
    return new NotationSyntaxError(
      `Invalid number \`${fragment}\` in expression \`${expression}\`: ${reason}`,
      fragment
    );
  }
}
