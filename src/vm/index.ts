export { VM } from './interpreter.js';
export type { VmOptions, VmDump } from './interpreter.js';
export { Memory } from './memory.js';
export { StdoutSink, CollectingSink } from './sink.js';
export type { OutputSink } from './sink.js';
export { formatDump } from './dump.js';
