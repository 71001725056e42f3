import type { Expression } from "./ast.ts";
import { err } from "./errors.ts";
import { Lexer, type LexerOptions } from "./lexer.ts";
import {
  GROUP_CLOSE,
  GROUP_OPEN,
  infixPower,
  isDelimiter,
  postfixPower,
  prefixPower,
  TERNARY,
  TERNARY_SEP,
} from "./power.ts";
import { type Token, TokenType } from "./token.ts";

const describe = (token: Token): string =>
  token.type === TokenType.EOF ? "end of input" : `'${token.value}'`;

/**Deepest nesting of groups, prefix operators and right operands */
export const MAX_DEPTH = 1000;

/**Parser */
export class Parser {
  private lexer: Lexer;
  private depth = 0;
  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  public parse = (): Expression => {
    const expr = this.exprBp(0);
    const rest = this.lexer.peek();
    if (rest.type !== TokenType.EOF) {
      return err(
        "Parser",
        "UnexpectedToken",
        `Unexpected token: ${describe(rest)}`,
      );
    }
    return expr;
  };

  private expect = (op: string): void => {
    const token = this.lexer.next();
    if (token.type !== TokenType.OP || token.value !== op) {
      err(
        "Parser",
        "UnexpectedToken",
        `Expected '${op}', found ${describe(token)}`,
      );
    }
  };

  private exprBp = (minBp: number): Expression => {
    if (this.depth >= MAX_DEPTH) {
      return err("Parser", "UnexpectedToken", "expression nested too deeply");
    }
    this.depth++;
    const expr = this.exprAt(minBp);
    this.depth--;
    return expr;
  };

  private exprAt = (minBp: number): Expression => {
    const token = this.lexer.next();
    let lhs: Expression;

    switch (token.type) {
      case TokenType.LEAF: {
        lhs = { type: "Val", value: token.value };
        break;
      }
      case TokenType.OP: {
        if (token.value === GROUP_OPEN) {
          lhs = this.exprBp(0);
          this.expect(GROUP_CLOSE);
          break;
        }
        const rBp = prefixPower(token.value);
        if (rBp === null) {
          return err(
            "Parser",
            "UnboundOperator",
            `'${token.value}' is not a prefix operator`,
          );
        }
        const argument = this.exprBp(rBp);
        lhs = { type: "UnaryOp", op: token.value, fixity: "prefix", argument };
        break;
      }
      default: {
        return err(
          "Parser",
          "UnexpectedToken",
          `Unexpected ${describe(token)}`,
        );
      }
    }

    while (true) {
      const lookahead = this.lexer.peek();
      if (lookahead.type === TokenType.EOF) break;
      if (lookahead.type === TokenType.LEAF) {
        return err(
          "Parser",
          "UnexpectedToken",
          `Unexpected token: ${describe(lookahead)}`,
        );
      }

      const op = lookahead.value;
      if (isDelimiter(op)) break;

      const lBp = postfixPower(op);
      if (lBp !== null) {
        if (lBp < minBp) break;
        this.lexer.next();
        lhs = { type: "UnaryOp", op, fixity: "postfix", argument: lhs };
        continue;
      }

      const power = infixPower(op);
      if (power === null) {
        return err(
          "Parser",
          "UnboundOperator",
          `'${op}' is not an infix operator`,
        );
      }
      const [leftBp, rightBp] = power;
      if (leftBp < minBp) break;

      this.lexer.next();

      if (op === TERNARY) {
        const then = this.exprBp(0);
        this.expect(TERNARY_SEP);
        const otherwise = this.exprBp(rightBp);
        lhs = { type: "Ternary", op, cond: lhs, then, else: otherwise };
      } else {
        const right = this.exprBp(rightBp);
        lhs = { type: "BinOp", op, left: lhs, right };
      }
    }

    return lhs;
  };
}

export const parse = (src: string, options: LexerOptions = {}): Expression =>
  new Parser(new Lexer(src, options)).parse();
