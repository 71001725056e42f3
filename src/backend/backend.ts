import type { Instruction } from "../bytecode/instruction.ts";
import { err } from "../errors.ts";

export type Evaluator = () => number;

/**
 * Something that turns a postfix program into a callable.
 *
 * A backend evaluates on a 32-bit signed integer stack. `Binary` pops the
 * right operand first, then the left, and pushes one result. The callable
 * returns the single value left once the program ends.
 *
 * Instances are not reentrant: compile one program at a time, and dispose
 * of the backend once done with it.
 */
export interface Backend {
  readonly name: string;
  compile: (program: readonly Instruction[]) => Evaluator;
  dispose: () => void;
}

/**Acquires a backend for the span of `fn`, disposing it even if `fn` throws */
export const withBackend = <T>(
  create: () => Backend,
  fn: (backend: Backend) => T,
): T => {
  const backend = create();
  try {
    return fn(backend);
  } finally {
    backend.dispose();
  }
};

/**Shared disposal bookkeeping for backends */
export abstract class BaseBackend implements Backend {
  abstract readonly name: string;
  private disposed = false;

  protected abstract build: (program: readonly Instruction[]) => Evaluator;

  public compile = (program: readonly Instruction[]): Evaluator => {
    if (this.disposed) {
      return err(
        "Backend",
        "BackendFailure",
        `${this.name} backend has been disposed`,
      );
    }
    return this.build(program);
  };

  public dispose = (): void => {
    this.disposed = true;
  };
}
