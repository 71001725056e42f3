import { err } from "../errors.ts";
import { Op } from "./bytecode.ts";
import type { Instruction } from "./instruction.ts";

export interface Chunk {
  code: Uint8Array;
  constants: number[];
  /**Deepest the stack gets while the chunk runs */
  maxStack: number;
}

const MAX_CONSTANTS = 0x10000;

const binaryOps = {
  "+": Op.ADD,
  "-": Op.SUB,
  "*": Op.MUL,
  "/": Op.DIV,
} as const;

const unaryOps = {
  "-": Op.NEG,
  "+": Op.POS,
} as const;

/**Compiler: lowers a postfix program to bytecode ending in RET */
export class Compiler {
  private constants: number[] = [];
  private constIndex: Map<number, number> = new Map();
  private codes: number[] = [];
  private depth = 0;
  private maxStack = 0;

  emit = (op: Op, ...arg: number[]): void => {
    this.codes.push(op, ...arg);
  };

  private addConstant = (value: number): number => {
    const known = this.constIndex.get(value);
    if (known !== undefined) return known;
    if (this.constants.length >= MAX_CONSTANTS) {
      return err("Compiler", "BackendFailure", "Too many constants");
    }
    this.constants.push(value);
    this.constIndex.set(value, this.constants.length - 1);
    return this.constants.length - 1;
  };

  private pop = (count: number, at: number): void => {
    if (this.depth < count) {
      err(
        "Compiler",
        "BackendFailure",
        `Stack underflow at instruction ${at}`,
      );
    }
    this.depth -= count;
  };

  private push = (): void => {
    this.depth++;
    this.maxStack = Math.max(this.maxStack, this.depth);
  };

  public compile = (program: readonly Instruction[]): Chunk => {
    program.forEach((inst, at) => {
      switch (inst.type) {
        case "Push": {
          const idx = this.addConstant(inst.value);
          this.emit(Op.LOAD_CONST, (idx >> 8) & 0xff, idx & 0xff);
          this.push();
          break;
        }
        case "Binary": {
          this.pop(2, at);
          this.emit(binaryOps[inst.op]);
          this.push();
          break;
        }
        case "Unary": {
          this.pop(1, at);
          this.emit(unaryOps[inst.op]);
          this.push();
          break;
        }
      }
    });

    if (this.depth !== 1) {
      return err(
        "Compiler",
        "BackendFailure",
        `Program leaves ${this.depth} values on the stack, expected 1`,
      );
    }
    this.emit(Op.RET);

    return {
      code: new Uint8Array(this.codes),
      constants: this.constants,
      maxStack: this.maxStack,
    };
  };
}
