import type { TraceTag } from './tags.js';
import { AsyncLocalStorage } from 'node:async_hooks';
import { traceToStderr } from '../util/env.js';

const store = new AsyncLocalStorage<TraceTag[]>();
const tags: TraceTag[] = [];

/**
 * Records a tag in the innermost `withTraceLog` scope, or in the process-wide
 * buffer drained by `take` when no scope is active.
 */
export function emit(tag: TraceTag): void {
  (store.getStore() ?? tags).push(tag);
  if (traceToStderr()) {
    process.stderr.write(JSON.stringify(tag) + '\n');
  }
}

export function take(): TraceTag[] {
  return tags.splice(0, tags.length);
}

export function withTraceLog<T>(fn: () => T): { result: T; tags: TraceTag[] } {
  const buf: TraceTag[] = [];
  const result = store.run(buf, fn);
  return { result, tags: buf.slice() };
}
