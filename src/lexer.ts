import { err } from "./errors.ts";
import { isKnownOperator } from "./power.ts";
import { type Token, TokenType } from "./token.ts";
import { isalnum, isdigit, isspace } from "./utils.ts";

export interface LexerOptions {
  /**Reject operator characters that have no binding power */
  strict?: boolean;
}

const EOF_TOKEN: Token = Object.freeze({ type: TokenType.EOF, value: "" });

export const tokenize = (src: string, options: LexerOptions = {}): Token[] => {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < src.length) {
    const ch = src[pos];

    if (isspace(ch)) {
      pos++;
      continue;
    }

    if (isdigit(ch)) {
      const start = pos;
      while (pos < src.length && isdigit(src[pos])) pos++;
      tokens.push({ type: TokenType.LEAF, value: src.slice(start, pos) });
      continue;
    }

    if (isalnum(ch)) {
      tokens.push({ type: TokenType.LEAF, value: ch });
      pos++;
      continue;
    }

    if (options.strict && !isKnownOperator(ch)) {
      return err(
        "Lexer",
        "IllegalCharacter",
        `Illegal character '${ch}' at column ${pos}`,
      );
    }
    tokens.push({ type: TokenType.OP, value: ch });
    pos++;
  }

  tokens.push(EOF_TOKEN);
  return tokens;
};

/**Lexer: a forward-only cursor over the tokens of one input */
export class Lexer {
  private tokens: Token[];
  private pos = 0;

  constructor(src: string, options: LexerOptions = {}) {
    this.tokens = tokenize(src, options);
  }

  public peek = (): Token =>
    this.pos < this.tokens.length ? this.tokens[this.pos] : EOF_TOKEN;

  public next = (): Token => {
    const token = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return token;
  };
}
