import { CPU } from '@core/cpu/cpu';
import { CpuFaultError } from '@core/cpu/faults';
import type { CpuFault, StepResult } from '@core/cpu/faults';
import type { RandomSource } from '@core/cpu/random';
import type { Display } from '@core/display/display';
import { FrameBuffer } from '@core/display/framebuffer';
import { Keypad } from '@core/input/keypad';

export type FaultPolicy = 'halt' | 'continue';

export interface RunSummary {
  cycles: number; // cycles attempted, faulted ones included
  faults: CpuFault[];
  halted: boolean;
}

export interface SystemOptions {
  // Defaults to an owned 64x32 FrameBuffer
  display?: Display;
  random?: RandomSource;
  trace?: boolean;
}

export class Chip8System {
  public cpu: CPU;
  public keypad: Keypad;
  public display: Display;
  // Set only when the system owns its framebuffer
  public framebuffer: FrameBuffer | null;

  constructor(opts: SystemOptions = {}) {
    if (opts.display) {
      this.display = opts.display;
      this.framebuffer = null;
    } else {
      const fb = new FrameBuffer();
      this.display = fb;
      this.framebuffer = fb;
    }
    this.keypad = new Keypad();
    this.cpu = new CPU(this.display, this.keypad, { random: opts.random, trace: opts.trace });
  }

  reset() { this.cpu.reset(); }

  // Power-on sequence: reset (font + cleared screen), then copy the image to $200
  loadProgram(image: Uint8Array) {
    this.cpu.reset();
    this.cpu.load(image);
  }

  setPressedKeys(indices: Iterable<number>) { this.cpu.setKeys(indices); }

  stepCycle(): StepResult { return this.cpu.step(); }

  // The driver's fatal-stop policy: any fault becomes an exception
  stepOrThrow(): void {
    const r = this.cpu.step();
    if (!r.ok) throw new CpuFaultError(r.fault, this.cpu.state);
  }

  // `beforeCycle` runs ahead of each step with the 0-based cycle number (key schedules)
  run(cycles: number, policy: FaultPolicy = 'halt', beforeCycle?: (cycle: number) => void): RunSummary {
    const faults: CpuFault[] = [];
    let n = 0;
    while (n < cycles) {
      if (beforeCycle) beforeCycle(n);
      const r = this.cpu.step();
      n++;
      if (!r.ok) {
        faults.push(r.fault);
        if (policy === 'halt') return { cycles: n, faults, halted: true };
      }
    }
    return { cycles: n, faults, halted: false };
  }
}
