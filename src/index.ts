export * as model from './model/index.js';
export * as vm from './vm/index.js';
export * as codegen from './codegen/index.js';
export * as trace from './trace/index.js';
export { VM } from './vm/interpreter.js';
export { compile } from './codegen/compile.js';
export { disassemble } from './codegen/disasm.js';
export { interpret } from './run.js';
export type { RunOutcome } from './run.js';
export { VmError, isVmError } from './errors.js';
export type { VmErrorCode, VmErrorDetails } from './errors.js';
export { ok, failure, capture, isOk, formatFailure } from './result.js';
export type { ExecResult, ExecOk, ExecFailure, ExecError } from './result.js';
