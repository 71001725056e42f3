/**
 * Binding powers of every operator, by role.
 *
 * Infix pairs are `[left, right]`: `left < right` binds left-associatively,
 * `left > right` right-associatively. Adding an operator means adding an
 * entry here; the parser needs no change unless the operator has its own
 * shape, like the ternary.
 */

export const GROUP_OPEN = "(";
export const GROUP_CLOSE = ")";
export const TERNARY = "?";
export const TERNARY_SEP = ":";

const prefix: ReadonlyMap<string, number> = new Map([
  ["+", 9],
  ["-", 9],
]);

const infix: ReadonlyMap<string, readonly [number, number]> = new Map([
  ["=", [2, 1]],
  [TERNARY, [4, 3]],
  ["+", [5, 6]],
  ["-", [5, 6]],
  ["*", [7, 8]],
  ["/", [7, 8]],
  [".", [14, 13]],
]);

const postfix: ReadonlyMap<string, number> = new Map([
  ["!", 11],
  ["[", 11],
]);

export const prefixPower = (op: string): number | null =>
  prefix.get(op) ?? null;

export const infixPower = (op: string): readonly [number, number] | null =>
  infix.get(op) ?? null;

export const postfixPower = (op: string): number | null =>
  postfix.get(op) ?? null;

/**Closes a construct opened further up: a group or a ternary middle */
export const isDelimiter = (op: string): boolean =>
  op === GROUP_CLOSE || op === TERNARY_SEP;

export const isKnownOperator = (op: string): boolean =>
  op === GROUP_OPEN || isDelimiter(op) || prefix.has(op) || infix.has(op) ||
  postfix.has(op);
