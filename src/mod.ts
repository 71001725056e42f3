export type { BinOp, Expression, Ternary, UnaryOp, Val } from "./ast.ts";
export { Lexer, tokenize } from "./lexer.ts";
export { parse, Parser } from "./parser.ts";
export { linearize, toPostfix } from "./postfix.ts";
export {
  assemble,
  type Instruction,
  render,
} from "./bytecode/instruction.ts";
export { Compiler } from "./bytecode/compiler.ts";
export { GVM } from "./bytecode/gvm.ts";
export { dis } from "./bytecode/bytecode.ts";
export {
  type Backend,
  type Evaluator,
  withBackend,
} from "./backend/backend.ts";
export { VmBackend } from "./backend/vm.ts";
export { JsBackend } from "./backend/js.ts";
export { backends, defaultOptions, type Options } from "./config.ts";
export { type Evaluation, evaluate, execute } from "./eval.ts";
export { type ErrorKind, RpnError } from "./errors.ts";
export { repl } from "./repl.ts";
