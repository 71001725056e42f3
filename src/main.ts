import { Command, Option } from "commander";
import { dis } from "./bytecode/bytecode.ts";
import { Compiler } from "./bytecode/compiler.ts";
import { assemble, render } from "./bytecode/instruction.ts";
import {
  backendNames,
  defaultOptions,
  isBackendName,
  type Options,
  resolveOptions,
} from "./config.ts";
import { err } from "./errors.ts";
import { evaluate, execute } from "./eval.ts";
import { parse } from "./parser.ts";
import { linearize, toPostfix } from "./postfix.ts";
import { repl } from "./repl.ts";

const program = new Command();

const options = (): Options => {
  const { backend, strict } = program.opts<{
    backend: string;
    strict: boolean;
  }>();
  if (!isBackendName(backend)) {
    return err("CLI", "Unsupported", `Unknown backend '${backend}'`);
  }
  return resolveOptions({ backend, strict });
};

const printEval = (expr: string): void => {
  const { postfix, value } = evaluate(expr, options());
  console.log(`${postfix} -> ${value}`);
};

const printPostfix = (expr: string): void => {
  console.log(toPostfix(parse(expr, options())));
};

const printAST = (expr: string): void => {
  console.dir(parse(expr, options()), { depth: null });
};

const printBytecode = (expr: string): void => {
  const chunk = new Compiler().compile(linearize(parse(expr, options())));
  console.log(dis(chunk));
};

const run = (postfix: string): void => {
  const instructions = assemble(postfix);
  console.log(`${render(instructions)} -> ${execute(instructions, options())}`);
};

const main = async (): Promise<void> => {
  program
    .name("rpnc")
    .version("0.1.0")
    .description("Compiles infix arithmetic to postfix and runs it")
    .addOption(
      new Option("-b, --backend <name>", "execution backend")
        .choices(backendNames)
        .default(defaultOptions.backend),
    )
    .option("--strict", "reject unknown operator characters", false)
    .action(async () => await repl(options()));

  program
    .command("repl")
    .description("Read expressions line by line")
    .action(async () => await repl(options()));
  program
    .command("eval <expr>")
    .description("Print the postfix form and the value of an expression")
    .action(printEval);
  program
    .command("rpn <expr>")
    .description("Print the postfix form of an expression")
    .action(printPostfix);
  program
    .command("ast <expr>")
    .description("Show the tree of an expression")
    .action(printAST);
  program
    .command("dis <expr>")
    .description("Show the bytecode of an expression")
    .action(printBytecode);
  program
    .command("run <postfix>")
    .description("Assemble postfix text and run it")
    .action(run);

  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
};

await main();
