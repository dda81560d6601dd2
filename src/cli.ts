#!/usr/bin/env node
import { Command, CommanderError } from 'commander';

import { runCommand, type RunArgs } from './commands/run.js';
import { compileCommand, type CompileArgs } from './commands/compile.js';
import { EXIT_USAGE } from './commands/io.js';

const program = new Command();
program
  .name('stack-vm')
  .description('stack-vm compiler and runtime')
  .exitOverride();

program
  .command('run')
  .argument('<file>', 'source file, or .json bytecode')
  .option('--dump', 'print stack, memory and labels to stderr after the run')
  .option('--trace', 'write trace events to stderr as JSON lines')
  .option('--exit-with-result', 'use the final value (low 8 bits) as the exit code')
  .action(async (file: string, options: RunArgs) => {
    process.exitCode = await runCommand(file, options);
  });

program
  .command('compile')
  .argument('<file>', 'source file, or .json bytecode')
  .option('--json', 'print bytecode JSON instead of source')
  .action(async (file: string, options: CompileArgs) => {
    process.exitCode = await compileCommand(file, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? 0 : EXIT_USAGE;
    return;
  }
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_USAGE;
});
