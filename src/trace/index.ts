export * from './tags.js';
export { emit, take, withTraceLog } from './log.js';
