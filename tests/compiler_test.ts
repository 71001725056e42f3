import { test } from "node:test";
import assert from "node:assert/strict";
import { dis } from "../src/bytecode/bytecode.ts";
import { Compiler } from "../src/bytecode/compiler.ts";
import { assemble } from "../src/bytecode/instruction.ts";

test("Compiler", () => {
  const chunk = new Compiler().compile(assemble("3 4 +"));
  assert.deepEqual(chunk.code, new Uint8Array([0, 0, 0, 0, 0, 1, 1, 7]));
  assert.deepEqual(chunk.constants, [3, 4]);
  assert.equal(chunk.maxStack, 2);
});

test("Compiler shares repeated constants", () => {
  const chunk = new Compiler().compile(assemble("2 2 * 2 -"));
  assert.deepEqual(chunk.constants, [2]);
  assert.deepEqual(
    chunk.code,
    new Uint8Array([0, 0, 0, 0, 0, 0, 3, 0, 0, 0, 2, 7]),
  );
});

test("Compiler tracks the deepest stack", () => {
  assert.equal(new Compiler().compile(assemble("1 2 3 4 + + +")).maxStack, 4);
  assert.equal(new Compiler().compile(assemble("1 2 + 3 + 4 +")).maxStack, 2);
});

test("Compiler lowers unary signs", () => {
  const chunk = new Compiler().compile([
    { type: "Push", value: 5 },
    { type: "Unary", op: "-" },
    { type: "Unary", op: "+" },
  ]);
  assert.deepEqual(chunk.code, new Uint8Array([0, 0, 0, 5, 6, 7]));
});

test("Compiler checks the stack discipline", () => {
  assert.throws(() => new Compiler().compile([]), {
    kind: "BackendFailure",
    message: "Compiler: Program leaves 0 values on the stack, expected 1",
  });
  assert.throws(() => new Compiler().compile(assemble("1 +")), {
    kind: "BackendFailure",
    message: "Compiler: Stack underflow at instruction 1",
  });
  assert.throws(() => new Compiler().compile(assemble("1 2")), {
    message: "Compiler: Program leaves 2 values on the stack, expected 1",
  });
});

test("Disassembler lists the chunk", () => {
  const chunk = new Compiler().compile(assemble("3 4 +"));
  assert.equal(
    dis(chunk),
    [
      "=== Bytecode ===",
      "Constants: 3, 4",
      "Code length: 8",
      "Max stack: 2",
      "",
      "0000: LOAD_CONST      0 ; 3",
      "0003: LOAD_CONST      1 ; 4",
      "0006: ADD",
      "0007: RET",
      "============================",
    ].join("\n"),
  );
});
