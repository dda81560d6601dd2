import { VmError } from '../errors.js';

/**
 * Flat cell store. Grows only by appending at the current length.
 */
export class Memory {
  private cells: bigint[] = [];

  get length(): number {
    return this.cells.length;
  }

  load(addr: bigint, ip: number): bigint {
    if (addr < 0n || addr >= BigInt(this.cells.length)) {
      throw new VmError('E_MEM_LOAD', `load from ${addr} outside memory of length ${this.cells.length}`, {
        ip,
        addr: addr.toString(),
      });
    }
    return this.cells[Number(addr)];
  }

  store(addr: bigint, value: bigint, ip: number): void {
    if (addr < 0n || addr > BigInt(this.cells.length)) {
      throw new VmError('E_MEM_STORE', `store to ${addr} past end of memory of length ${this.cells.length}`, {
        ip,
        addr: addr.toString(),
      });
    }
    const i = Number(addr);
    if (i === this.cells.length) this.cells.push(value);
    else this.cells[i] = value;
  }

  snapshot(): bigint[] {
    return this.cells.slice();
  }

  clear(): void {
    this.cells.length = 0;
  }
}
