import type { Instr, BareOpcode } from '../model/instruction.js';
import { OPCODE_TOKENS } from './compile.js';

const TOKEN_FOR = new Map<BareOpcode, string>([...OPCODE_TOKENS].map(([tok, op]): [BareOpcode, string] => [op, tok]));

export function instrToken(ins: Instr): string {
  switch (ins.op) {
    case 'LIT': return ins.value.toString();
    case 'LABEL': return `${ins.id}:`;
    default: {
      const tok = TOKEN_FOR.get(ins.op);
      if (tok === undefined) throw new Error(`no token for ${ins.op}`);
      return tok;
    }
  }
}

/**
 * Source text that compiles back to `instrs`. A label opens a new line and
 * each jump closes one.
 */
export function disassemble(instrs: readonly Instr[]): string {
  const lines: string[][] = [[]];
  for (const ins of instrs) {
    if (ins.op === 'LABEL' && lines[lines.length - 1].length > 0) lines.push([]);
    lines[lines.length - 1].push(instrToken(ins));
    if (ins.op === 'JMP' || ins.op === 'CJMP') lines.push([]);
  }
  return lines
    .filter((toks) => toks.length > 0)
    .map((toks) => toks.join(' '))
    .join('\n');
}
