import type { Chunk } from "./compiler.ts";

export const enum Op {
  LOAD_CONST,
  ADD,
  SUB,
  MUL,
  DIV,
  NEG,
  POS,
  RET,
}

const opNames = [
  "LOAD_CONST",
  "ADD",
  "SUB",
  "MUL",
  "DIV",
  "NEG",
  "POS",
  "RET",
];

/**Disassembles a chunk into a printable listing */
export const dis = (chunk: Chunk): string => {
  const lines = [
    "=== Bytecode ===",
    `Constants: ${chunk.constants.join(", ")}`,
    `Code length: ${chunk.code.length}`,
    `Max stack: ${chunk.maxStack}`,
    "",
  ];

  let ip = 0;
  const code = chunk.code;

  while (ip < code.length) {
    const address = ip;
    const op = code[ip++];
    const opName = opNames[op] ?? `UNKNOWN_${op}`;
    const line = `${address.toString().padStart(4, "0")}: ${opName}`;

    switch (op) {
      case Op.LOAD_CONST: {
        const high = code[ip++];
        const low = code[ip++];
        const constIndex = (high << 8) | low;
        lines.push(
          `${line.padEnd(21)} ${constIndex} ; ${chunk.constants[constIndex]}`,
        );
        break;
      }
      default:
        lines.push(line);
        break;
    }
  }

  lines.push("============================");
  return lines.join("\n");
};
