import { err } from "../errors.ts";
import { Op } from "./bytecode.ts";
import type { Chunk } from "./compiler.ts";

const fail = (msg: string): never => err("VM", "BackendFailure", msg);

/**Stack VM over 32-bit signed integers */
export class GVM {
  private ip = 0;
  private sp = 0;
  private stack: Int32Array;

  constructor(private chunk: Chunk) {
    this.stack = new Int32Array(chunk.maxStack);
  }

  private push = (value: number): void => {
    if (this.sp >= this.stack.length) fail("Stack overflow");
    this.stack[this.sp++] = value;
  };

  private pop = (): number => {
    if (this.sp === 0) return fail("Stack underflow");
    return this.stack[--this.sp];
  };

  private binary = (apply: (left: number, right: number) => number) => () => {
    const right = this.pop();
    const left = this.pop();
    this.push(apply(left, right));
  };

  public run = (): number => {
    this.ip = 0;
    this.sp = 0;

    const jmpTable: (() => void)[] = [];
    jmpTable[Op.LOAD_CONST] = () => {
      const high = this.chunk.code[this.ip++];
      const low = this.chunk.code[this.ip++];
      const value = this.chunk.constants[(high << 8) | low];
      if (value === undefined) fail(`No constant at ${(high << 8) | low}`);
      this.push(value);
    };
    jmpTable[Op.ADD] = this.binary((left, right) => left + right);
    jmpTable[Op.SUB] = this.binary((left, right) => left - right);
    jmpTable[Op.MUL] = this.binary((left, right) => Math.imul(left, right));
    jmpTable[Op.DIV] = this.binary((left, right) => {
      if (right === 0) return fail("Division by zero");
      return Math.trunc(left / right);
    });
    jmpTable[Op.NEG] = () => {
      this.push(-this.pop());
    };
    jmpTable[Op.POS] = () => {
      this.push(this.pop());
    };

    while (this.ip < this.chunk.code.length) {
      const op = this.chunk.code[this.ip++];
      if (op === Op.RET) return this.pop();
      const handler = jmpTable[op];
      if (handler === undefined) return fail(`Unknown opcode ${op}`);
      handler();
    }

    return fail("Missing RET");
  };
}
