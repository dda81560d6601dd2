// Centralized, cached environment flags for the VM runtime.
let _trace: boolean | undefined;
let _traceStderr: boolean | undefined;

function flag(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function traceEnabled(): boolean {
  if (_trace === undefined) _trace = flag('STACKVM_TRACE');
  return _trace;
}

export function traceToStderr(): boolean {
  if (_traceStderr === undefined) _traceStderr = flag('STACKVM_TRACE_STDERR');
  return _traceStderr;
}

// For tests only: reset the cached flags.
export function __resetEnvCacheForTests__() {
  _trace = undefined;
  _traceStderr = undefined;
}
