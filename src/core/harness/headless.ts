import { Chip8System } from '@core/system/system';
import type { FaultPolicy } from '@core/system/system';
import { describeFault } from '@core/cpu/faults';
import type { CpuFault } from '@core/cpu/faults';
import type { RandomSource } from '@core/cpu/random';
import { validateProgram } from '@core/program/loader';
import { crc32 } from '@utils/crc32';

export interface RunResult {
  cycles: number;
  reason: 'limit' | 'fault';
  fault?: CpuFault;
  message?: string;
  faultCount: number;
  frameCrc: number; // CRC32 of the final 64x32 framebuffer
}

export interface RunOptions {
  maxCycles: number;
  onFault?: FaultPolicy;
  // Pressed keys per cycle: a fixed set, or a schedule keyed by cycle number
  keys?: number[] | ((cycle: number) => number[]);
  random?: RandomSource;
}

export function runProgram(image: Uint8Array, opts: RunOptions): RunResult {
  validateProgram(image);
  const sys = new Chip8System({ random: opts.random });
  sys.loadProgram(image);
  return runSystem(sys, opts);
}

export function runSystem(sys: Chip8System, opts: RunOptions): RunResult {
  const policy = opts.onFault ?? 'halt';
  const keysAt = typeof opts.keys === 'function' ? opts.keys : () => (Array.isArray(opts.keys) ? opts.keys : []);
  const { cycles, faults, halted } = sys.run(opts.maxCycles, policy, (cycle) => sys.setPressedKeys(keysAt(cycle)));
  const last: CpuFault | undefined = faults[faults.length - 1];
  const frameCrc = frameCrcOf(sys);
  if (halted && last) {
    return { cycles, reason: 'fault', fault: last, message: describeFault(last), faultCount: faults.length, frameCrc };
  }
  return { cycles, reason: 'limit', fault: last, faultCount: faults.length, frameCrc };
}

function frameCrcOf(sys: Chip8System): number {
  return sys.framebuffer ? crc32(sys.framebuffer.getFrameBuffer()) : 0;
}
