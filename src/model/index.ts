export * from './instruction.js';
export * from './schema.js';
