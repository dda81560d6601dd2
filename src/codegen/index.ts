export { compile, compileToken, tokenize, parseLiteral, parseLabel, OPCODE_TOKENS } from './compile.js';
export type { Token } from './compile.js';
export { disassemble, instrToken } from './disasm.js';
