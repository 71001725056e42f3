import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Options } from "./config.ts";
import { evaluate } from "./eval.ts";

export const PROMPT = "<rpn> ";

export interface ReplIO {
  input: Readable;
  output: Writable;
}

/**Evaluates one line and formats its result or the failure */
export const evalLine = (
  line: string,
  options: Partial<Options> = {},
): string => {
  try {
    const { postfix, value } = evaluate(line, options);
    return `${postfix} -> ${value}`;
  } catch (e) {
    if (e instanceof Error) return `error: ${e.message}`;
    throw e;
  }
};

export const repl = async (
  options: Partial<Options> = {},
  io: ReplIO = { input: process.stdin, output: process.stdout },
): Promise<void> => {
  const rl = createInterface({ input: io.input, terminal: false });

  io.output.write(PROMPT);
  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (line === "quit") break;
      if (line !== "") io.output.write(`${evalLine(line, options)}\n`);
      io.output.write(PROMPT);
    }
  } finally {
    rl.close();
  }
};
