import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { VM } from '../src/vm/interpreter.js';
import { CollectingSink } from '../src/vm/sink.js';
import { interpret } from '../src/run.js';
import { compile } from '../src/codegen/compile.js';
import { disassemble } from '../src/codegen/disasm.js';
import { BARE_OPCODES, I64_MAX, I64_MIN, bare, label, lit, type Instr } from '../src/model/instruction.js';
import { VmError } from '../src/errors.js';

const i64 = fc.bigInt({ min: I64_MIN, max: I64_MAX });

const instrArb: fc.Arbitrary<Instr> = fc.oneof(
  fc.constantFrom(...BARE_OPCODES).map((op) => bare(op)),
  i64.map((v) => lit(v)),
  fc.nat({ max: 64 }).map((id) => label(id)),
);

const freshVm = () => new VM({ sink: new CollectingSink(), trace: false });

describe('properties', () => {
  it('a b + yields the wrapped sum', () => {
    fc.assert(
      fc.property(i64, i64, (a, b) => {
        const res = interpret(`${a} ${b} +`);
        expect(res).toEqual({ ok: true, value: { value: BigInt.asIntN(64, a + b), output: [] } });
      })
    );
  });

  it('dup then swap keeps the top two cells', () => {
    fc.assert(
      fc.property(i64, i64, (a, b) => {
        const vm = freshVm();
        expect(vm.execute([lit(a), lit(b), bare('DUP'), bare('SWAP')])).toBe(b);
        expect(vm.dump().stack).toEqual([a, b]);
      })
    );
  });

  it('lit then put emits exactly the decimal value', () => {
    fc.assert(
      fc.property(i64, (v) => {
        expect(interpret(`${v} .`)).toEqual({ ok: true, value: { value: null, output: [v.toString()] } });
      })
    );
  });

  it('comparisons push exactly one 0 or 1', () => {
    fc.assert(
      fc.property(i64, i64, fc.constantFrom('EQ' as const, 'LT' as const, 'GT' as const), (a, b, op) => {
        const vm = freshVm();
        vm.execute([lit(a), lit(b), bare(op), lit(0), bare('STORE')]);
        expect(vm.dump().stack).toEqual([]);
        const [flag] = vm.dump().memory;
        const holds = op === 'EQ' ? b === a : op === 'LT' ? b < a : b > a;
        expect(flag).toBe(holds ? 1n : 0n);
      })
    );
  });

  it('store appends exactly at the memory length', () => {
    fc.assert(
      fc.property(fc.array(i64, { maxLength: 16 }), (cells) => {
        const vm = freshVm();
        cells.forEach((v, i) => vm.execute([lit(v), lit(i), bare('STORE')]));
        expect(vm.dump().memory).toEqual(cells);
        const n = cells.length;
        expect(() => vm.execute([lit(n), bare('LOAD')])).toThrowError('E_MEM_LOAD');
        expect(() => vm.execute([lit(0), lit(n + 1), bare('STORE')])).toThrowError('E_MEM_STORE');
      })
    );
  });

  it('disassembly compiles back to the same program', () => {
    fc.assert(
      fc.property(fc.array(instrArb, { maxLength: 40 }), (prog) => {
        expect(compile(disassemble(prog))).toEqual(prog);
      })
    );
  });

  it('never throws anything but VmError on arbitrary programs', () => {
    const noLoops = instrArb.filter((ins) => ins.op !== 'JMP' && ins.op !== 'CJMP');
    fc.assert(
      fc.property(fc.array(noLoops, { maxLength: 40 }), (prog) => {
        try {
          freshVm().execute(prog);
        } catch (err) {
          expect(err).toBeInstanceOf(VmError);
        }
      })
    );
  });

  it('never throws anything but VmError when every jump goes forward', () => {
    // Labels only follow the jumps, so each run terminates.
    const head = instrArb.filter((ins) => ins.op !== 'LABEL');
    const tail = instrArb.filter((ins) => ins.op !== 'JMP' && ins.op !== 'CJMP');
    const small = fc.integer({ min: 0, max: 3 }).map((v) => lit(v));
    fc.assert(
      fc.property(
        fc.array(fc.oneof(head, small), { maxLength: 20 }),
        fc.array(fc.oneof(tail, fc.nat({ max: 3 }).map((id) => label(id))), { maxLength: 20 }),
        (body, rest) => {
          try {
            freshVm().execute([...body, ...rest]);
          } catch (err) {
            expect(err).toBeInstanceOf(VmError);
          }
        }
      )
    );
  });
});
