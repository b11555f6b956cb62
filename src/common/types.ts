/** Reported as the maximum of rollables without an upper bound. */
export const MAX_RESULT = Number.MAX_SAFE_INTEGER;

/** Lowest result any node will report. */
export const MIN_RESULT = Number.MIN_SAFE_INTEGER;

export type Operator = "+" | "-" | "*" | "/" | "^";

export type Algorithm = "DH" | "DL" | "KH" | "KL";

export type Comparator = "=" | ">" | "<";

export const OPERATORS: readonly Operator[] = ["+", "-", "*", "/", "^"];
export const ALGORITHMS: readonly Algorithm[] = ["DH", "DL", "KH", "KL"];
export const COMPARATORS: readonly Comparator[] = ["=", ">", "<"];
