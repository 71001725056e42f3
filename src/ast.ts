export type NodeType = "Val" | "UnaryOp" | "BinOp" | "Ternary";

export interface Node {
  type: NodeType;
}

export type Expression = Val | UnaryOp | BinOp | Ternary;

/**A digit run or a single letter */
export interface Val extends Node {
  type: "Val";
  value: string;
}

export interface UnaryOp extends Node {
  type: "UnaryOp";
  op: string;
  fixity: "prefix" | "postfix";
  argument: Expression;
}

export interface BinOp extends Node {
  type: "BinOp";
  op: string;
  left: Expression;
  right: Expression;
}

export interface Ternary extends Node {
  type: "Ternary";
  op: string;
  cond: Expression;
  then: Expression;
  else: Expression;
}

/**Children in the order they are written */
export const children = (expr: Expression): Expression[] => {
  switch (expr.type) {
    case "Val":
      return [];
    case "UnaryOp":
      return [expr.argument];
    case "BinOp":
      return [expr.left, expr.right];
    case "Ternary":
      return [expr.cond, expr.then, expr.else];
  }
};

/**Every node after its children, walked with an explicit stack */
export const postOrder = (root: Expression): Expression[] => {
  const visited: Expression[] = [];
  const pending: Expression[] = [root];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    visited.push(node);
    pending.push(...children(node));
  }
  return visited.reverse();
};
