import { describe, it, expect } from 'vitest';
import { interpret } from '../src/run.js';
import { formatDump } from '../src/vm/dump.js';
import { capture, failure, formatFailure, isOk, ok } from '../src/result.js';
import { VmError } from '../src/errors.js';

describe('interpret', () => {
  it('collects output and the final value', () => {
    expect(interpret('1 . 2 3 +')).toEqual({ ok: true, value: { value: 5n, output: ['1'] } });
  });

  it('returns compile faults as failures', () => {
    const res = interpret('1 x');
    expect(isOk(res)).toBe(false);
    expect(formatFailure(res)).toBe(
      `E_TOKEN: malformed token 'x' at 1:3 | details={"token":"x","index":1,"line":1,"column":3}`
    );
  });

  it('uses a fresh VM each time', () => {
    expect(interpret('7 0 store').ok).toBe(true);
    expect(interpret('0 load')).toEqual(failure('E_MEM_LOAD', 'load from 0 outside memory of length 0', { ip: 1, addr: '0' }));
  });
});

describe('result helpers', () => {
  it('omits empty details', () => {
    expect(failure('E_TOKEN', 'bad', {})).toEqual({ ok: false, error: { code: 'E_TOKEN', explain: 'bad' } });
    expect(formatFailure(failure('E_TOKEN', 'bad'))).toBe('E_TOKEN: bad');
    expect(formatFailure(ok(1))).toBe('ok');
  });

  it('capture only converts VmError', () => {
    expect(capture(() => { throw new VmError('E_DIV_ZERO', 'boom'); })).toEqual(failure('E_DIV_ZERO', 'boom'));
    expect(() => capture(() => { throw new TypeError('bug'); })).toThrowError(TypeError);
  });
});

describe('formatDump', () => {
  it('lists the stack top first', () => {
    const text = formatDump({ stack: [1n, 2n], memory: [], labels: [0, 4] });
    expect(text).toBe(
      [
        '---- stack ----',
        'top => 1 2',
        '       0 1',
        '---- memory ----',
        '(empty)',
        '---- labels ----',
        '0: -> 0',
        '1: -> 4',
      ].join('\n')
    );
  });
});
