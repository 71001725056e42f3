import { test } from "node:test";
import assert from "node:assert/strict";
import { type Backend, withBackend } from "../src/backend/backend.ts";
import { generate, JsBackend } from "../src/backend/js.ts";
import { VmBackend } from "../src/backend/vm.ts";
import { assemble } from "../src/bytecode/instruction.ts";
import { parse } from "../src/parser.ts";
import { linearize } from "../src/postfix.ts";

const factories: [string, () => Backend][] = [
  ["vm", () => new VmBackend()],
  ["js", () => new JsBackend()],
];

for (const [name, create] of factories) {
  const compile = (postfix: string): number =>
    withBackend(create, (backend) => backend.compile(assemble(postfix))());

  test(`${name} backend evaluates postfix programs`, () => {
    assert.equal(compile("3 4 +"), 7);
    assert.equal(compile("3 4 + 5 *"), 35);
    assert.equal(compile("1 2 - 3 -"), -4);
    assert.equal(compile("42 35 12 + * 7 3 - / 8 +"), 501);
  });

  test(`${name} backend follows 32-bit integer arithmetic`, () => {
    assert.equal(compile("2147483647 1 +"), -2147483648);
    assert.equal(compile("99999 88888 *"), 298776520);
    assert.equal(compile("7 2 /"), 3);
    assert.equal(compile("2147483648 1 -"), 2147483647);
  });

  test(`${name} backend runs unary signs`, () => {
    const program = linearize(parse("-3 * (4 + 2) - +1"));
    const value = withBackend(create, (backend) => backend.compile(program)());
    assert.equal(value, -19);
  });

  test(`${name} backend fails on division by zero when called`, () => {
    withBackend(create, (backend) => {
      const evaluator = backend.compile(assemble("1 0 /"));
      assert.throws(evaluator, { kind: "BackendFailure" });
    });
  });

  test(`${name} backend rejects unbalanced programs`, () => {
    assert.throws(() => compile("1 +"), { kind: "BackendFailure" });
    assert.throws(() => compile("1 2"), { kind: "BackendFailure" });
    assert.throws(() => compile(""), { kind: "BackendFailure" });
  });

  test(`${name} backend evaluates a 5,000-term chain`, () => {
    const program = linearize(parse(Array(5000).fill("1").join(" + ")));
    const value = withBackend(create, (backend) => backend.compile(program)());
    assert.equal(value, 5000);
  });

  test(`${name} backend refuses to compile once disposed`, () => {
    const backend = create();
    backend.dispose();
    assert.throws(() => backend.compile(assemble("1")), {
      kind: "BackendFailure",
      message: `Backend: ${name} backend has been disposed`,
    });
  });
}

test("withBackend disposes the backend when the body throws", () => {
  let disposed = 0;
  const create = (): Backend => ({
    name: "fake",
    compile: () => () => 0,
    dispose: () => {
      disposed++;
    },
  });

  assert.throws(
    () =>
      withBackend(create, () => {
        throw new Error("boom");
      }),
    { message: "boom" },
  );
  assert.equal(disposed, 1);
  assert.equal(withBackend(create, (backend) => backend.compile([])()), 0);
  assert.equal(disposed, 2);
});

test("JS backend generates one variable per stack slot", () => {
  assert.equal(
    generate(assemble("3 4 + 5 *")),
    [
      `"use strict";`,
      "let s0 = 0, s1 = 0;",
      "s0 = 3;",
      "s1 = 4;",
      "s0 = (s0 + s1) | 0;",
      "s1 = 5;",
      "s0 = Math.imul(s0, s1);",
      "return s0;",
    ].join("\n"),
  );
  assert.equal(
    generate(assemble("8 2 /")),
    [
      `"use strict";`,
      "let s0 = 0, s1 = 0;",
      "s0 = 8;",
      "s1 = 2;",
      "s0 = div(s0, s1);",
      "return s0;",
    ].join("\n"),
  );
  assert.equal(
    generate([
      { type: "Push", value: -5 },
      { type: "Unary", op: "-" },
    ]),
    [
      `"use strict";`,
      "let s0 = 0;",
      "s0 = -5;",
      "s0 = (-s0) | 0;",
      "return s0;",
    ].join("\n"),
  );
});
