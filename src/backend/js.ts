import type { Instruction } from "../bytecode/instruction.ts";
import { err } from "../errors.ts";
import { BaseBackend, type Evaluator } from "./backend.ts";

const fail = (msg: string): never => err("JS", "BackendFailure", msg);

const div = (left: number, right: number): number => {
  if (right === 0) return fail("Division by zero");
  return Math.trunc(left / right) | 0;
};

const slot = (depth: number): string => `s${depth}`;

/**
 * Turns a postfix program into a flat function body with one variable per
 * stack slot, so that `3 4 + 5 *` becomes
 *
 * ```js
 * "use strict";
 * let s0 = 0, s1 = 0;
 * s0 = 3;
 * s1 = 4;
 * s0 = (s0 + s1) | 0;
 * s1 = 5;
 * s0 = Math.imul(s0, s1);
 * return s0;
 * ```
 */
export const generate = (program: readonly Instruction[]): string => {
  const lines: string[] = [];
  let depth = 0;
  let maxDepth = 0;

  const need = (count: number, at: number): void => {
    if (depth < count) fail(`Stack underflow at instruction ${at}`);
  };

  program.forEach((inst, at) => {
    switch (inst.type) {
      case "Push": {
        lines.push(`${slot(depth)} = ${inst.value};`);
        depth++;
        maxDepth = Math.max(maxDepth, depth);
        break;
      }
      case "Unary": {
        need(1, at);
        const top = slot(depth - 1);
        if (inst.op === "-") lines.push(`${top} = (-${top}) | 0;`);
        break;
      }
      case "Binary": {
        need(2, at);
        const left = slot(depth - 2);
        const right = slot(depth - 1);
        switch (inst.op) {
          case "+":
          case "-":
            lines.push(`${left} = (${left} ${inst.op} ${right}) | 0;`);
            break;
          case "*":
            lines.push(`${left} = Math.imul(${left}, ${right});`);
            break;
          case "/":
            lines.push(`${left} = div(${left}, ${right});`);
            break;
        }
        depth--;
        break;
      }
    }
  });

  if (depth !== 1) {
    return fail(`Program leaves ${depth} values on the stack, expected 1`);
  }

  const slots = Array.from(
    { length: maxDepth },
    (_, i) => `${slot(i)} = 0`,
  );
  return [
    `"use strict";`,
    `let ${slots.join(", ")};`,
    ...lines,
    `return ${slot(0)};`,
  ].join("\n");
};

const toFunction = (body: string): Function => {
  try {
    return new Function("div", body);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return fail(`Cannot build generated code: ${reason}`);
  }
};

/**Generates a JavaScript function per program */
export class JsBackend extends BaseBackend {
  readonly name = "js";

  protected build = (program: readonly Instruction[]): Evaluator => {
    const fn = toFunction(generate(program));
    return () => {
      const result: unknown = Reflect.apply(fn, undefined, [div]);
      if (typeof result !== "number") {
        return fail(`Generated code returned ${typeof result}`);
      }
      return result;
    };
  };
}
