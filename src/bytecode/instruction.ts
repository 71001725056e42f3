import { err } from "../errors.ts";
import { isdigit, isspace } from "../utils.ts";

export type BinaryOp = "+" | "-" | "*" | "/";
export type UnaryOp = "-" | "+";

export type Instruction =
  | { type: "Push"; value: number }
  | { type: "Binary"; op: BinaryOp }
  | { type: "Unary"; op: UnaryOp };

export const isBinaryOp = (op: string): op is BinaryOp =>
  op === "+" || op === "-" || op === "*" || op === "/";

export const isUnaryOp = (op: string): op is UnaryOp =>
  op === "-" || op === "+";

/**Reads a digit run as a 32-bit signed integer, wrapping like C's int */
export const toInt32 = (digits: string): number =>
  Number(BigInt.asIntN(32, BigInt(digits)));

/**
 * Assembles postfix text such as `3 4 + 5 *` into instructions.
 *
 * Postfix text does not record arity, so `-` and `+` always assemble to
 * binary operations. Parentheses are skipped.
 */
export const assemble = (text: string): Instruction[] => {
  const program: Instruction[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];
    if (isspace(ch) || ch === "(" || ch === ")") {
      pos++;
      continue;
    }
    if (isdigit(ch)) {
      const start = pos;
      while (pos < text.length && isdigit(text[pos])) pos++;
      program.push({ type: "Push", value: toInt32(text.slice(start, pos)) });
      continue;
    }
    if (isBinaryOp(ch)) {
      program.push({ type: "Binary", op: ch });
      pos++;
      continue;
    }
    return err(
      "Assembler",
      "Unsupported",
      `cannot compile: ${text.slice(pos)}`,
    );
  }

  return program;
};

export const render = (program: readonly Instruction[]): string =>
  program.map((inst) => {
    switch (inst.type) {
      case "Push":
        return `${inst.value}`;
      case "Binary":
      case "Unary":
        return inst.op;
    }
  }).join(" ");
