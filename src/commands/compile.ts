import { disassemble } from '../codegen/disasm.js';
import { programToJson } from '../model/schema.js';
import { isVmError } from '../errors.js';
import { EXIT_FAULT, EXIT_OK, EXIT_USAGE, loadProgram, processIO, type CliIO } from './io.js';

export type CompileArgs = {
  json?: boolean;
};

export async function compileCommand(file: string, args: CompileArgs = {}, io: CliIO = processIO): Promise<number> {
  try {
    const instrs = await loadProgram(file);
    io.stdout(`${args.json ? programToJson(instrs) : disassemble(instrs)}\n`);
    return EXIT_OK;
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return isVmError(error) ? EXIT_FAULT : EXIT_USAGE;
  }
}
