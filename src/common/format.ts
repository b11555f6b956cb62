import { MAX_RESULT, MIN_RESULT } from "./types";

const PLAIN_GROUP = /^\d*D(\d+|F|%|\[-?\d+(,-?\d+)*\])$/;

/** Keeps a result within the safe integer range; also turns -0 into 0. */
export function clampResult(value: number): number {
  if (value === 0) return 0;
  if (value > MAX_RESULT) return MAX_RESULT;
  if (value < MIN_RESULT) return MIN_RESULT;
  return value;
}

export function sum(values: readonly number[]): number {
  return clampResult(values.reduce((total, value) => total + value, 0));
}

/** Renders a value for an operation string, negatives in parentheses. */
export function formatValue(value: number): string {
  return value < 0 ? `(${value})` : `${value}`;
}

/** Parenthesizes an operation that would break a surrounding sum. */
export function wrapSummand(operation: string): string {
  if (operation.includes("+") || operation.startsWith("-")) {
    return `(${operation})`;
  }
  return operation;
}

/** Parenthesizes any compound or negative operation. */
export function wrapOperand(operation: string): string {
  if (operation.includes(" ") || operation.startsWith("-")) {
    return `(${operation})`;
  }
  return operation;
}

/** Whether a notation is a single dice group such as `4D6` or `D[1,3]`. */
export function isPlainGroup(notation: string): boolean {
  return PLAIN_GROUP.test(notation);
}

/** Parenthesizes a notation unless it is a single dice group. */
export function wrapNotation(notation: string): string {
  return isPlainGroup(notation) ? notation : `(${notation})`;
}
