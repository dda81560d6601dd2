import type { Instr } from '../model/instruction.js';
import type { OutputSink } from './sink.js';
import type { TraceTag } from '../trace/tags.js';
import { StdoutSink } from './sink.js';
import { Memory } from './memory.js';
import { VmError } from '../errors.js';
import { capture, type ExecResult } from '../result.js';
import { emit } from '../trace/log.js';
import { traceEnabled } from '../util/env.js';

export interface VmOptions {
  sink?: OutputSink;
  /** Overrides STACKVM_TRACE for this VM. */
  trace?: boolean;
  /** Receives each tag as it is raised, in place of the trace log. */
  onTag?: (tag: TraceTag) => void;
}

export interface VmDump {
  stack: bigint[];
  memory: bigint[];
  labels: number[];
}

type ArithOp = 'ADD' | 'SUB' | 'MUL' | 'DIV';
type CompareOp = 'EQ' | 'LT' | 'GT';

const wrap = (v: bigint): bigint => BigInt.asIntN(64, v);

function arith(op: ArithOp, a: bigint, b: bigint, ip: number): bigint {
  switch (op) {
    case 'ADD': return wrap(a + b);
    case 'SUB': return wrap(a - b);
    case 'MUL': return wrap(a * b);
    case 'DIV':
      if (b === 0n) throw new VmError('E_DIV_ZERO', `division of ${a} by zero`, { ip });
      return wrap(a / b);
  }
}

function compare(op: CompareOp, a: bigint, b: bigint): bigint {
  switch (op) {
    case 'EQ': return a === b ? 1n : 0n;
    case 'LT': return a < b ? 1n : 0n;
    case 'GT': return a > b ? 1n : 0n;
  }
}

/**
 * Stack machine. Stack, memory and jump table belong to the instance and
 * survive across `execute` calls until `reset`.
 */
export class VM {
  private stack: bigint[] = [];
  private memory = new Memory();
  private labels: number[] = [];
  private readonly sink: OutputSink;
  private readonly trace: boolean;
  private readonly onTag: (tag: TraceTag) => void;

  constructor(opts: VmOptions = {}) {
    this.sink = opts.sink ?? StdoutSink;
    this.trace = opts.trace ?? traceEnabled();
    this.onTag = opts.onTag ?? emit;
  }

  /**
   * Runs `program` to its end and pops the final stack top. Returns undefined
   * when the stack is empty at the end or when any pop underflows.
   */
  execute(program: readonly Instr[]): bigint | undefined {
    let ip = 0;
    try {
      this.bindLabels(program);
      while (ip < program.length) {
        const next = this.step(program[ip], ip);
        if (next === undefined) {
          this.emit({ kind: 'Halt', reason: 'underflow', ip, value: null });
          return undefined;
        }
        ip = next;
      }
    } catch (err) {
      if (err instanceof VmError) {
        const at = err.details.ip;
        this.emit({ kind: 'Fault', code: err.code, ip: typeof at === 'number' ? at : ip });
      }
      throw err;
    }
    const top = this.stack.pop();
    this.emit({ kind: 'Halt', reason: 'end', ip, value: top === undefined ? null : top.toString() });
    return top;
  }

  tryExecute(program: readonly Instr[]): ExecResult<bigint | null> {
    return capture(() => this.execute(program) ?? null);
  }

  dump(): VmDump {
    return {
      stack: this.stack.slice(),
      memory: this.memory.snapshot(),
      labels: this.labels.slice(),
    };
  }

  reset(): void {
    this.stack.length = 0;
    this.memory.clear();
    this.labels.length = 0;
  }

  private bindLabels(program: readonly Instr[]): void {
    program.forEach((ins, i) => {
      if (ins.op !== 'LABEL') return;
      if (ins.id > this.labels.length) {
        throw new VmError('E_LABEL_ORDER', `label ${ins.id} introduced before label ${this.labels.length}`, {
          ip: i,
          label: ins.id,
        });
      }
      this.labels[ins.id] = i;
      this.emit({ kind: 'Bind', label: ins.id, index: i });
    });
  }

  private target(id: bigint, ip: number): number {
    if (id < 0n || id >= BigInt(this.labels.length)) {
      throw new VmError('E_LABEL_UNDEFINED', `jump to undefined label ${id}`, { ip, label: id.toString() });
    }
    const to = this.labels[Number(id)];
    this.emit({ kind: 'Jump', from: ip, to, label: Number(id) });
    return to;
  }

  // Returns the next instruction pointer, or undefined on stack underflow.
  private step(ins: Instr, ip: number): number | undefined {
    const { stack } = this;
    switch (ins.op) {
      case 'ADD':
      case 'SUB':
      case 'MUL':
      case 'DIV': {
        const a = stack.pop(); if (a === undefined) return undefined;
        const b = stack.pop(); if (b === undefined) return undefined;
        stack.push(arith(ins.op, a, b, ip));
        break;
      }
      case 'LIT': stack.push(ins.value); break;
      case 'LOAD': {
        const addr = stack.pop(); if (addr === undefined) return undefined;
        stack.push(this.memory.load(addr, ip));
        break;
      }
      case 'STORE': {
        const addr = stack.pop(); if (addr === undefined) return undefined;
        const value = stack.pop(); if (value === undefined) return undefined;
        this.memory.store(addr, value, ip);
        break;
      }
      case 'LABEL': break;
      case 'JMP': {
        const id = stack.pop(); if (id === undefined) return undefined;
        return this.target(id, ip);
      }
      case 'CJMP': {
        const id = stack.pop(); if (id === undefined) return undefined;
        const cond = stack.pop(); if (cond === undefined) return undefined;
        if (cond !== 0n) return this.target(id, ip);
        break;
      }
      case 'PUT': {
        const a = stack.pop(); if (a === undefined) return undefined;
        const line = a.toString();
        this.emit({ kind: 'Emit', ip, value: line });
        this.sink.put(line);
        break;
      }
      case 'DUP': {
        const a = stack.pop(); if (a === undefined) return undefined;
        stack.push(a, a);
        break;
      }
      case 'SWAP': {
        // Pushed back in pop order: the old top ends up second.
        const a = stack.pop(); if (a === undefined) return undefined;
        const b = stack.pop(); if (b === undefined) return undefined;
        stack.push(a, b);
        break;
      }
      case 'EQ':
      case 'LT':
      case 'GT': {
        const a = stack.pop(); if (a === undefined) return undefined;
        const b = stack.pop(); if (b === undefined) return undefined;
        stack.push(compare(ins.op, a, b));
        break;
      }
      default: {
        const _: never = ins;
        throw new Error('unknown opcode');
      }
    }
    return ip + 1;
  }

  private emit(tag: TraceTag): void {
    if (this.trace) this.onTag(tag);
  }
}
