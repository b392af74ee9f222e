import type { Word, MachineState } from './types';
import { MEMORY_SIZE } from './types';

export type BoundsRegion = 'memory' | 'stack' | 'keypad';

export type CpuFault =
  | { kind: 'unrecognized-opcode'; opcode: Word; pc: Word }
  // opcode is null when the fault happened while fetching
  | { kind: 'out-of-bounds'; region: BoundsRegion; opcode: Word | null; pc: Word; address: number }
  | { kind: 'random-source'; opcode: Word; pc: Word; cause: unknown };

export type StepResult =
  | { ok: true; opcode: Word }
  | { ok: false; fault: CpuFault };

const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');

export function describeFault(fault: CpuFault): string {
  const at = `at $${hex(fault.pc, 3)}`;
  switch (fault.kind) {
    case 'unrecognized-opcode':
      return `Unrecognized opcode $${hex(fault.opcode, 4)} ${at}`;
    case 'out-of-bounds': {
      const target = fault.region === 'memory' ? `$${hex(fault.address, 3)}` : `${fault.address}`;
      const by = fault.opcode === null ? 'during fetch' : `by opcode $${hex(fault.opcode, 4)}`;
      return `Out-of-bounds ${fault.region} access (${target}) ${by} ${at}`;
    }
    case 'random-source': {
      const reason = fault.cause instanceof Error ? fault.cause.message : String(fault.cause);
      return `Random source failed for opcode $${hex(fault.opcode, 4)} ${at}: ${reason}`;
    }
  }
}

// Headline plus a register, memory and stack dump for post-mortem debugging
export function formatFault(fault: CpuFault, s: MachineState): string {
  const regs = Array.from(s.v, (b, k) => `V${k.toString(16).toUpperCase()}=${hex(b, 2)}`).join(' ');
  const dump = (start: number, len: number) => {
    const bytes: string[] = [];
    for (let k = 0; k < len; k++) {
      const a = start + k;
      if (a >= 0 && a < MEMORY_SIZE) bytes.push(hex(s.memory[a], 2));
    }
    return bytes.join(' ');
  };
  const from = Math.max(0, Math.min(fault.pc, MEMORY_SIZE) - 8);
  const stack = Array.from(s.stack.subarray(0, Math.min(s.sp, s.stack.length)), (a) => `$${hex(a, 3)}`).join(' ');
  return `${describeFault(fault)}\n`
    + `Regs: ${regs} I=${hex(s.i, 4)} PC=${hex(s.pc, 4)} SP=${s.sp} DT=${s.dt} ST=${s.st}\n`
    + `Mem[$${hex(from, 3)}..]: ${dump(from, 18)}\n`
    + `Stack[SP=${s.sp}]: ${stack || '(empty)'}`;
}

export class CpuFaultError extends Error {
  readonly fault: CpuFault;

  constructor(fault: CpuFault, state?: MachineState) {
    super(state ? formatFault(fault, state) : describeFault(fault));
    this.name = 'CpuFaultError';
    this.fault = fault;
  }
}
