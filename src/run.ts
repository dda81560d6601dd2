import { compile } from './codegen/compile.js';
import { VM } from './vm/interpreter.js';
import { CollectingSink } from './vm/sink.js';
import { capture, type ExecResult } from './result.js';

export interface RunOutcome {
  value: bigint | null;
  output: string[];
}

/**
 * Compiles and runs `source` on a fresh VM, collecting PUT lines instead of
 * writing them. Compile and runtime faults both come back as failures.
 */
export function interpret(source: string, opts: { trace?: boolean } = {}): ExecResult<RunOutcome> {
  const sink = new CollectingSink();
  const vm = new VM({ sink, trace: opts.trace });
  return capture(() => {
    const value = vm.execute(compile(source)) ?? null;
    return { value, output: sink.lines };
  });
}
