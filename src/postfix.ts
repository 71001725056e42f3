import { type Expression, postOrder } from "./ast.ts";
import {
  type Instruction,
  isBinaryOp,
  isUnaryOp,
  toInt32,
} from "./bytecode/instruction.ts";
import { err } from "./errors.ts";
import { isdigit } from "./utils.ts";

const symbol = (expr: Expression): string =>
  expr.type === "Val" ? expr.value : expr.op;

/**Renders the tree in postfix order: every child left to right, then the node */
export const toPostfix = (expr: Expression): string =>
  postOrder(expr).map(symbol).join(" ");

const isNumber = (value: string): boolean =>
  value.length > 0 && [...value].every(isdigit);

/**Lowers the tree to stack instructions, in the same order as `toPostfix` */
export const linearize = (expr: Expression): Instruction[] => {
  const program: Instruction[] = [];

  const emit = (node: Expression): void => {
    switch (node.type) {
      case "Val": {
        if (!isNumber(node.value)) {
          return err(
            "Linearizer",
            "Unsupported",
            `'${node.value}' is not an integer constant`,
          );
        }
        program.push({ type: "Push", value: toInt32(node.value) });
        return;
      }
      case "UnaryOp": {
        if (node.fixity === "prefix" && isUnaryOp(node.op)) {
          program.push({ type: "Unary", op: node.op });
          return;
        }
        return err(
          "Linearizer",
          "Unsupported",
          `${node.fixity} '${node.op}' has no instruction`,
        );
      }
      case "BinOp": {
        if (isBinaryOp(node.op)) {
          program.push({ type: "Binary", op: node.op });
          return;
        }
        return err(
          "Linearizer",
          "Unsupported",
          `infix '${node.op}' has no instruction`,
        );
      }
      case "Ternary": {
        return err(
          "Linearizer",
          "Unsupported",
          `'${node.op}' has no instruction`,
        );
      }
    }
  };

  postOrder(expr).forEach(emit);
  return program;
};
