// Bigint payloads travel as decimal strings so tags stay JSON-serializable.

export interface Bind {
  kind: 'Bind';
  label: number;
  index: number;
}

export interface Jump {
  kind: 'Jump';
  from: number;
  to: number;
  label: number;
}

export interface Emit {
  kind: 'Emit';
  ip: number;
  value: string;
}

export interface Halt {
  kind: 'Halt';
  reason: 'end' | 'underflow';
  ip: number;
  value: string | null;
}

export interface Fault {
  kind: 'Fault';
  code: string;
  ip: number;
}

export type TraceTag =
  | Bind
  | Jump
  | Emit
  | Halt
  | Fault;
