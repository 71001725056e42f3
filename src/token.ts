export const enum TokenType {
  LEAF,
  OP,
  EOF,
}

export type Token = {
  readonly type: TokenType;
  readonly value: string;
};
