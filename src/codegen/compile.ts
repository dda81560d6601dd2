import type { Instr, BareOpcode } from '../model/instruction.js';
import { I64_MIN, I64_MAX } from '../model/instruction.js';
import { VmError } from '../errors.js';

export interface Token {
  text: string;
  /** Zero-based position in the token stream. */
  index: number;
  line: number;
  column: number;
}

export const OPCODE_TOKENS: ReadonlyMap<string, BareOpcode> = new Map<string, BareOpcode>([
  ['+', 'ADD'],
  ['-', 'SUB'],
  ['*', 'MUL'],
  ['/', 'DIV'],
  ['load', 'LOAD'],
  ['store', 'STORE'],
  ['jmp', 'JMP'],
  ['cjmp', 'CJMP'],
  ['.', 'PUT'],
  ['dup', 'DUP'],
  ['swap', 'SWAP'],
  ['=', 'EQ'],
  ['<', 'LT'],
  ['>', 'GT'],
]);

const INT_RE = /^[+-]?\d+$/;
const LABEL_RE = /^\+?(\d+):$/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const lines = source.split(/\r?\n/);
  lines.forEach((text, row) => {
    for (const m of text.matchAll(/\S+/g)) {
      tokens.push({ text: m[0], index: tokens.length, line: row + 1, column: (m.index ?? 0) + 1 });
    }
  });
  return tokens;
}

/** Parses a 64-bit signed decimal literal; undefined when the token is not one. */
export function parseLiteral(text: string): bigint | undefined {
  if (!INT_RE.test(text)) return undefined;
  const negative = text.startsWith('-');
  const digits = text.replace(/^[+-]/, '');
  const magnitude = BigInt(digits);
  const value = negative ? -magnitude : magnitude;
  if (value < I64_MIN || value > I64_MAX) return undefined;
  return value;
}

/** Parses a `<id>:` label definition; undefined when the token is not one. */
export function parseLabel(text: string): number | undefined {
  const m = LABEL_RE.exec(text);
  if (!m) return undefined;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) ? id : undefined;
}

export function compileToken(token: Token): Instr {
  const op = OPCODE_TOKENS.get(token.text);
  if (op !== undefined) return { op };
  const value = parseLiteral(token.text);
  if (value !== undefined) return { op: 'LIT', value };
  const id = parseLabel(token.text);
  if (id !== undefined) return { op: 'LABEL', id };
  throw new VmError('E_TOKEN', `malformed token '${token.text}' at ${token.line}:${token.column}`, {
    token: token.text,
    index: token.index,
    line: token.line,
    column: token.column,
  });
}

export function compile(source: string): Instr[] {
  return tokenize(source).map(compileToken);
}
