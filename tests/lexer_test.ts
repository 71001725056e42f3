import { test } from "node:test";
import assert from "node:assert/strict";
import { Lexer, tokenize } from "../src/lexer.ts";
import { TokenType } from "../src/token.ts";

test("Lexer merges digit runs and splits everything else", () => {
  assert.deepEqual(tokenize("12+ab"), [
    { type: TokenType.LEAF, value: "12" },
    { type: TokenType.OP, value: "+" },
    { type: TokenType.LEAF, value: "a" },
    { type: TokenType.LEAF, value: "b" },
    { type: TokenType.EOF, value: "" },
  ]);
});

test("Lexer skips whitespace", () => {
  const values = tokenize("  3 \t+\n 4\r ").map((t) => t.value);
  assert.deepEqual(values, ["3", "+", "4", ""]);
});

test("Lexer accepts unknown characters as operators", () => {
  assert.deepEqual(tokenize("$"), [
    { type: TokenType.OP, value: "$" },
    { type: TokenType.EOF, value: "" },
  ]);
});

test("Lexer rejects unknown characters in strict mode", () => {
  assert.throws(() => tokenize("1 + $", { strict: true }), {
    kind: "IllegalCharacter",
    message: "Lexer: Illegal character '$' at column 4",
  });
  assert.equal(tokenize("a ? (b) : c!", { strict: true }).length, 9);
});

test("Lexer cursor peeks and advances", () => {
  const lexer = new Lexer("7 *");
  assert.equal(lexer.peek().value, "7");
  assert.equal(lexer.next().value, "7");
  assert.equal(lexer.next().value, "*");
  assert.equal(lexer.next().type, TokenType.EOF);
  assert.equal(lexer.next().type, TokenType.EOF);
  assert.equal(lexer.peek().type, TokenType.EOF);
});

test("Lexer hands out a frozen end marker", () => {
  const tokens = tokenize("1");
  assert.equal(Object.isFrozen(tokens[tokens.length - 1]), true);

  const lexer = new Lexer("");
  const end = lexer.next();
  assert.throws(() => Object.assign(end, { value: "x" }), TypeError);
  assert.equal(lexer.peek().value, "");
});
