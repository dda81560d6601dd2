
export type Instr =
  | { readonly op: 'ADD' }
  | { readonly op: 'SUB' }
  | { readonly op: 'MUL' }
  | { readonly op: 'DIV' }
  | { readonly op: 'LIT', readonly value: bigint }
  | { readonly op: 'LOAD' }
  | { readonly op: 'STORE' }
  | { readonly op: 'LABEL', readonly id: number }
  | { readonly op: 'JMP' }
  | { readonly op: 'CJMP' }
  | { readonly op: 'PUT' }
  | { readonly op: 'DUP' }
  | { readonly op: 'SWAP' }
  | { readonly op: 'EQ' }
  | { readonly op: 'LT' }
  | { readonly op: 'GT' };

export type Opcode = Instr['op'];

/** Opcodes that carry no operand. */
export type BareOpcode = Exclude<Opcode, 'LIT' | 'LABEL'>;

export const BARE_OPCODES = [
  'ADD', 'SUB', 'MUL', 'DIV',
  'LOAD', 'STORE',
  'JMP', 'CJMP',
  'PUT', 'DUP', 'SWAP',
  'EQ', 'LT', 'GT',
] as const satisfies readonly BareOpcode[];

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

export function lit(value: bigint | number): Instr {
  return { op: 'LIT', value: BigInt.asIntN(64, BigInt(value)) };
}

export function label(id: number): Instr {
  if (!Number.isSafeInteger(id) || id < 0) throw new Error(`label id must be a non-negative integer: ${id}`);
  return { op: 'LABEL', id };
}

export function bare(op: BareOpcode): Instr {
  return { op };
}
