export type VmErrorCode =
  | 'E_DIV_ZERO'
  | 'E_MEM_LOAD'
  | 'E_MEM_STORE'
  | 'E_LABEL_ORDER'
  | 'E_LABEL_UNDEFINED'
  | 'E_TOKEN'
  | 'E_BYTECODE';

export type VmErrorDetails = Record<string, string | number>;

/**
 * Fatal invariant violation. Never retried: callers let it propagate or turn
 * it into an ExecResult with `capture`.
 */
export class VmError extends Error {
  readonly code: VmErrorCode;
  readonly explain: string;
  readonly details: VmErrorDetails;

  constructor(code: VmErrorCode, explain: string, details: VmErrorDetails = {}) {
    super(`${code}: ${explain}`);
    this.name = 'VmError';
    this.code = code;
    this.explain = explain;
    this.details = details;
  }
}

export function isVmError(err: unknown): err is VmError {
  return err instanceof VmError;
}
