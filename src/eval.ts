import type { Expression } from "./ast.ts";
import { withBackend } from "./backend/backend.ts";
import type { Instruction } from "./bytecode/instruction.ts";
import { backends, type Options, resolveOptions } from "./config.ts";
import { parse } from "./parser.ts";
import { linearize, toPostfix } from "./postfix.ts";

export interface Evaluation {
  ast: Expression;
  postfix: string;
  program: Instruction[];
  value: number;
}

/**Runs a postfix program on a backend acquired for this call only */
export const execute = (
  program: readonly Instruction[],
  options: Partial<Options> = {},
): number => {
  const { backend } = resolveOptions(options);
  return withBackend(backends[backend], (b) => b.compile(program)());
};

export const evaluate = (
  line: string,
  options: Partial<Options> = {},
): Evaluation => {
  const opts = resolveOptions(options);
  const ast = parse(line, { strict: opts.strict });
  const program = linearize(ast);
  return {
    ast,
    postfix: toPostfix(ast),
    program,
    value: execute(program, opts),
  };
};
