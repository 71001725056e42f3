import { Compiler } from "../bytecode/compiler.ts";
import { GVM } from "../bytecode/gvm.ts";
import type { Instruction } from "../bytecode/instruction.ts";
import { BaseBackend, type Evaluator } from "./backend.ts";

/**Interprets programs on the bytecode VM */
export class VmBackend extends BaseBackend {
  readonly name = "vm";

  protected build = (program: readonly Instruction[]): Evaluator => {
    const chunk = new Compiler().compile(program);
    return () => new GVM(chunk).run();
  };
}
