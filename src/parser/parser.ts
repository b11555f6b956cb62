import { LRUCache } from "../common/lru-cache";
import { ALGORITHMS, COMPARATORS, OPERATORS } from "../common/types";
import type { Algorithm, Comparator, Operator } from "../common/types";
import { NotationSyntaxError } from "../errors";
import { MAX_ARITHMETIC_CHAIN } from "../modifier/arithmetic";
import type { DieNode, ExpressionNode, GroupNode } from "./nodes";

/**
 * Cache of parsed expression trees, keyed by the cleaned notation
 * (whitespace stripped, uppercased). Trees are plain readonly data, so a
 * cached tree can back any number of `parse()` calls.
 */
const parseCache = new LRUCache<string, ExpressionNode>(1000);

let cachingEnabled = true;

/** Enable or disable the internal parse cache. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  if (!enabled) clearParserCache();
}

/** Returns whether the internal parse cache is currently enabled. */
export function getCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Clears the internal parse cache. */
export function clearParserCache(): void {
  parseCache.clear();
}

/** Number of expression trees currently cached. */
export function getParserCacheSize(): number {
  return parseCache.size;
}

// The notation being parsed: remaining characters plus the source for messages.
type Input = {
  chars: string[];
  readonly source: string;
};

/**
 * Parse a dice notation into an expression tree.
 *
 * - Keywords are case-insensitive and whitespace is ignored.
 * - Throws `NotationSyntaxError` for anything outside the grammar.
 */
export function parseExpression(notation: string): ExpressionNode {
  const cleaned = notation.replace(/\s/g, "").toUpperCase();

  if (!cachingEnabled) return parseCleaned(cleaned, notation);

  return parseCache.getOrCreate(cleaned, () => parseCleaned(cleaned, notation));
}

function parseCleaned(cleaned: string, source: string): ExpressionNode {
  const input: Input = { chars: [...cleaned], source };
  if (input.chars.length === 0) {
    throw new NotationSyntaxError("The dice notation is empty", "");
  }

  const result = parseSum(input);
  if (input.chars.length > 0) throw unexpected(input);

  return result;
}

function parseSum(input: Input): ExpressionNode {
  const children: ExpressionNode[] = [parseTerm(input)];

  while (peek(input, "+")) {
    assertToken(input, "+");
    children.push(parseTerm(input));
  }

  return children.length === 1 ? children[0] : { type: "sum", children };
}

function parseTerm(input: Input): ExpressionNode {
  let node = parsePrimary(input);

  const algorithm = parseAlgorithm(input);
  if (algorithm !== undefined) {
    const threshold = peekIsDigit(input, 0) ? parseNumber(input) : 1;
    node = { type: "dropKeep", algorithm, threshold, child: node };
  }

  if (peek(input, "!")) {
    assertToken(input, "!");
    const comparator = parseComparator(input);
    if (comparator !== undefined) {
      const threshold = peekIsSignedNumber(input) ? parseSignedNumber(input) : undefined;
      node = { type: "explode", comparator, threshold, child: node };
    } else {
      const threshold = peekIsDigit(input, 0) ? parseNumber(input) : undefined;
      node = { type: "explode", comparator: "=", threshold, child: node };
    }
  }

  let chained = 0;
  let operator = parseOperator(input);
  while (operator !== undefined) {
    const digits = readDigits(input);
    if (digits.length === 0) throw unexpected(input);

    chained++;
    if (chained > MAX_ARITHMETIC_CHAIN) {
      throw NotationSyntaxError.dueToTooManyArithmetic(`${operator}${digits}`, input.source);
    }

    node = { type: "arithmetic", operator, operand: toInteger(digits, input), child: node };
    operator = parseOperator(input);
  }

  return node;
}

function parsePrimary(input: Input): ExpressionNode {
  if (peek(input, "(")) {
    assertToken(input, "(");
    const child = parseSum(input);
    assertToken(input, ")");
    return { type: "pool", child };
  }

  return parseGroup(input);
}

function parseGroup(input: Input): GroupNode {
  let count = 1;
  if (peekIsDigit(input, 0)) {
    const fragment = readDigits(input);
    count = toInteger(fragment, input);
    if (count < 1) {
      throw NotationSyntaxError.dueToOutOfRange(fragment, input.source, "a dice count must be at least 1");
    }
  }

  assertToken(input, "D");
  return { type: "group", count, die: parseDie(input) };
}

function parseDie(input: Input): DieNode {
  if (peek(input, "%")) {
    assertToken(input, "%");
    return { type: "percentile" };
  }

  if (peek(input, "F")) {
    assertToken(input, "F");
    return { type: "fudge" };
  }

  if (peek(input, "[")) {
    assertToken(input, "[");
    const faces = [parseSignedNumber(input)];
    while (peek(input, ",")) {
      assertToken(input, ",");
      faces.push(parseSignedNumber(input));
    }
    assertToken(input, "]");
    return { type: "custom", faces };
  }

  const fragment = readDigits(input);
  if (fragment.length === 0) throw unexpected(input);

  const sides = toInteger(fragment, input);
  if (sides < 2) {
    throw NotationSyntaxError.dueToOutOfRange(fragment, input.source, "a die must have at least 2 sides");
  }

  return { type: "sided", sides };
}

function parseAlgorithm(input: Input): Algorithm | undefined {
  if (!peek(input, "D") && !peek(input, "K")) return undefined;

  const code = input.chars.slice(0, 2).join("");
  const algorithm = ALGORITHMS.find((candidate) => candidate === code);
  // a `D` not followed by H/L is left for the caller to report
  if (algorithm === undefined) {
    if (peek(input, "K")) throw unexpected(input);
    return undefined;
  }

  assertToken(input, algorithm);
  return algorithm;
}

function parseComparator(input: Input): Comparator | undefined {
  const comparator = COMPARATORS.find((candidate) => peek(input, candidate));
  if (comparator !== undefined) assertToken(input, comparator);
  return comparator;
}

function parseOperator(input: Input): Operator | undefined {
  const operator = OPERATORS.find((candidate) => peek(input, candidate));
  if (operator === undefined) return undefined;

  // `+` in front of another dice group joins a new term instead
  if (operator === "+" && startsTerm(input, 1)) return undefined;

  assertToken(input, operator);
  return operator;
}

function startsTerm(input: Input, index: number): boolean {
  const { chars } = input;
  if (chars[index] === "(" || chars[index] === "D") return true;

  let i = index;
  while (i < chars.length && isDigit(chars[i])) i++;
  return i > index && chars[i] === "D";
}

function assertToken(input: Input, expected: string): void {
  for (const ch of expected) {
    if (input.chars[0] !== ch) throw unexpected(input);
    input.chars.shift();
  }
}

function peek(input: Input, expected: string): boolean {
  if (expected.length > input.chars.length) return false;

  for (let i = 0; i < expected.length; i++) {
    if (input.chars[i] !== expected.charAt(i)) return false;
  }

  return true;
}

function peekIsDigit(input: Input, index: number): boolean {
  return index < input.chars.length && isDigit(input.chars[index]);
}

function peekIsSignedNumber(input: Input): boolean {
  return peekIsDigit(input, 0) || (peek(input, "-") && peekIsDigit(input, 1));
}

function readDigits(input: Input): string {
  let digits = "";
  while (input.chars.length > 0 && isDigit(input.chars[0])) {
    digits += input.chars[0];
    input.chars.shift();
  }
  return digits;
}

function parseNumber(input: Input): number {
  const digits = readDigits(input);
  if (digits.length === 0) throw unexpected(input);
  return toInteger(digits, input);
}

function parseSignedNumber(input: Input): number {
  if (peek(input, "-")) {
    assertToken(input, "-");
    const value = parseNumber(input);
    return value === 0 ? 0 : -value;
  }
  return parseNumber(input);
}

function toInteger(digits: string, input: Input): number {
  const value = parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    throw NotationSyntaxError.dueToOutOfRange(digits, input.source, "the number is too large");
  }
  return value;
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function unexpected(input: Input): NotationSyntaxError {
  if (input.chars.length === 0) {
    return new NotationSyntaxError(`Unexpected end of expression \`${input.source}\``, "");
  }
  return NotationSyntaxError.dueToUnexpectedToken(input.chars.join(""), input.source);
}
