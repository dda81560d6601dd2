import { z } from 'zod';
import type { Instr } from './instruction.js';
import { BARE_OPCODES, I64_MIN, I64_MAX } from './instruction.js';
import { VmError } from '../errors.js';

export const BYTECODE_VERSION = '0.1';

// JSON has no 64-bit integers, so literal values are decimal strings.
const I64String = z
  .string()
  .regex(/^-?\d+$/, 'expected a decimal integer string')
  .transform((s, ctx) => {
    const v = BigInt(s);
    if (v < I64_MIN || v > I64_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${s} does not fit in 64 bits` });
      return z.NEVER;
    }
    return v;
  });

export const InstrSchema = z.union([
  z.object({ op: z.literal('LIT'), value: I64String }).strict(),
  z.object({ op: z.literal('LABEL'), id: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER) }).strict(),
  z.object({ op: z.enum(BARE_OPCODES) }).strict(),
]);

export const ProgramSchema = z.object({
  version: z.literal(BYTECODE_VERSION),
  instrs: z.array(InstrSchema),
});

export interface Program {
  version: string;
  instrs: Instr[];
}

export function parseProgramJson(text: string): Program {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new VmError('E_BYTECODE', `invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = ProgramSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new VmError('E_BYTECODE', `${where}: ${issue.message}`, { path: where });
  }
  return { version: parsed.data.version, instrs: parsed.data.instrs };
}

export function programToJson(instrs: readonly Instr[]): string {
  const plain = instrs.map((ins) => (ins.op === 'LIT' ? { op: ins.op, value: ins.value.toString() } : ins));
  return JSON.stringify({ version: BYTECODE_VERSION, instrs: plain }, null, 2);
}
