import { isVmError, type VmErrorCode, type VmErrorDetails } from './errors.js';

export interface ExecError {
  code: VmErrorCode;
  explain: string;
  details?: VmErrorDetails;
}

export interface ExecOk<T> {
  ok: true;
  value: T;
}

export interface ExecFailure {
  ok: false;
  error: ExecError;
}

export type ExecResult<T> = ExecOk<T> | ExecFailure;

export const ok = <T>(value: T): ExecOk<T> => ({ ok: true, value });

export const failure = (
  code: VmErrorCode,
  explain: string,
  details?: VmErrorDetails,
): ExecFailure => ({
  ok: false,
  error: {
    code,
    explain,
    ...(details === undefined || Object.keys(details).length === 0 ? {} : { details }),
  },
});

export const isOk = <T>(result: ExecResult<T>): result is ExecOk<T> => result.ok;

/**
 * Runs `fn`, turning a thrown VmError into a failure. Anything else is a bug
 * and keeps propagating.
 */
export function capture<T>(fn: () => T): ExecResult<T> {
  try {
    return ok(fn());
  } catch (err) {
    if (isVmError(err)) return failure(err.code, err.explain, err.details);
    throw err;
  }
}

export const formatFailure = (result: ExecResult<unknown>): string => {
  if (result.ok) return 'ok';
  const base = `${result.error.code}: ${result.error.explain}`;
  if (!result.error.details) return base;
  return `${base} | details=${JSON.stringify(result.error.details)}`;
};
