import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Instr } from '../model/instruction.js';
import { parseProgramJson } from '../model/schema.js';
import { compile } from '../codegen/compile.js';

export type CliIO = {
  stdout(text: string): void;
  stderr(text: string): void;
};

export const processIO: CliIO = {
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
};

export const EXIT_OK = 0;
export const EXIT_FAULT = 1;
export const EXIT_USAGE = 2;

/** `.json` files are bytecode; anything else is compiled as source. */
export async function loadProgram(file: string): Promise<Instr[]> {
  const text = await readFile(file, 'utf-8');
  if (path.extname(file).toLowerCase() === '.json') {
    return parseProgramJson(text).instrs;
  }
  return compile(text);
}
