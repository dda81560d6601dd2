import type { VmDump } from './interpreter.js';

function section(title: string, rows: string[]): string[] {
  return [`---- ${title} ----`, ...(rows.length === 0 ? ['(empty)'] : rows)];
}

/** Text rendering of a VM dump; the stack is listed top first. */
export function formatDump(dump: VmDump): string {
  const stack = dump.stack
    .map((v, i) => `${i === dump.stack.length - 1 ? 'top => ' : '       '}${i} ${v}`)
    .reverse();
  const memory = dump.memory.map((v, i) => `${i} ${v}`);
  const labels = dump.labels.map((index, id) => `${id}: -> ${index}`);
  return [
    ...section('stack', stack),
    ...section('memory', memory),
    ...section('labels', labels),
  ].join('\n');
}
