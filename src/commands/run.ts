import type { Instr } from '../model/instruction.js';
import { VM } from '../vm/interpreter.js';
import { formatDump } from '../vm/dump.js';
import { isVmError } from '../errors.js';
import { formatFailure } from '../result.js';
import { EXIT_FAULT, EXIT_OK, EXIT_USAGE, loadProgram, processIO, type CliIO } from './io.js';

export type RunArgs = {
  dump?: boolean;
  trace?: boolean;
  exitWithResult?: boolean;
};

export async function runCommand(file: string, args: RunArgs = {}, io: CliIO = processIO): Promise<number> {
  let instrs: Instr[];
  try {
    instrs = await loadProgram(file);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return isVmError(error) ? EXIT_FAULT : EXIT_USAGE;
  }

  // Tags go straight to stderr so they interleave with PUT output.
  const vm = new VM({
    sink: { put: (line) => io.stdout(`${line}\n`) },
    trace: args.trace ?? false,
    onTag: (tag) => io.stderr(`${JSON.stringify(tag)}\n`),
  });
  const result = vm.tryExecute(instrs);

  if (args.dump) {
    io.stderr(`${formatDump(vm.dump())}\n`);
  }
  if (!result.ok) {
    io.stderr(`${formatFailure(result)}\n`);
    return EXIT_FAULT;
  }
  if (result.value === null) return EXIT_OK;
  io.stdout(`${result.value}\n`);
  return args.exitWithResult ? Number(BigInt.asUintN(8, result.value)) : EXIT_OK;
}
