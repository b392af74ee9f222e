import type { Byte, Word, MachineState } from './types';
import {
  createMachineState, FLAG_REGISTER, KEY_COUNT, MEMORY_SIZE, PROGRAM_START, STACK_DEPTH, STACK_SENTINEL,
} from './types';
import { decode } from './decode';
import type { Instruction } from './decode';
import type { BoundsRegion, CpuFault, StepResult } from './faults';
import { CryptoRandomSource } from './random';
import type { RandomSource } from './random';
import type { Display } from '@core/display/display';
import { FONT_BASE, FONT_SET, GLYPH_HEIGHT } from '@core/display/font';
import { Keypad } from '@core/input/keypad';
import type { KeyState } from '@core/input/keypad';
import { MAX_PROGRAM_SIZE, ProgramLoadError } from '@core/program/loader';
import { envFlag } from '@utils/env';

export interface CpuOptions {
  random?: RandomSource;
  // Log every executed instruction to the console (defaults to TRACE_CPU=1)
  trace?: boolean;
}

const hex = (v: number, width: number) => v.toString(16).padStart(width, '0');

export class CPU {
  state: MachineState;
  private random: RandomSource;
  private traceEnabled: boolean;
  // optional external per-instruction trace hook
  private traceHook: ((pc: Word, opcode: Word) => void) | null = null;

  constructor(private display: Display, private keypad: KeyState = new Keypad(), options: CpuOptions = {}) {
    this.state = createMachineState();
    this.random = options.random ?? new CryptoRandomSource();
    this.traceEnabled = options.trace ?? envFlag('TRACE_CPU');
  }

  setTraceHook(fn: ((pc: Word, opcode: Word) => void) | null) { this.traceHook = fn; }

  reset() {
    const s = this.state;
    s.memory.fill(0);
    s.v.fill(0);
    s.stack.fill(0);
    s.i = 0; s.sp = 0; s.dt = 0; s.st = 0;
    s.pc = PROGRAM_START;
    this.display.clear();
    s.memory.set(FONT_SET, FONT_BASE);
  }

  load(image: Uint8Array) {
    if (image.length > MAX_PROGRAM_SIZE) {
      throw new ProgramLoadError(`Program image is ${image.length} bytes; at most ${MAX_PROGRAM_SIZE} fit`);
    }
    this.state.memory.set(image, PROGRAM_START);
  }

  setKeys(indices: Iterable<number>) { this.keypad.setPressed(indices); }

  // One full cycle: fetch the word at pc, execute it, tick timers
  step(): StepResult {
    const pc = this.state.pc;
    if (pc + 1 >= MEMORY_SIZE) {
      return { ok: false, fault: { kind: 'out-of-bounds', region: 'memory', opcode: null, pc, address: pc } };
    }
    const m = this.state.memory;
    return this.execute((m[pc] << 8) | m[pc + 1]);
  }

  execute(opcode: Word): StepResult {
    const op = opcode & 0xFFFF;
    const s = this.state;
    if (this.traceHook) this.traceHook(s.pc, op);
    if (this.traceEnabled) {
      // eslint-disable-next-line no-console
      console.log(`[trace] pc=$${hex(s.pc, 4)} op=$${hex(op, 4)} i=$${hex(s.i, 4)} sp=${s.sp} dt=${s.dt} st=${s.st}`);
    }
    const fault = this.dispatch(decode(op), op);
    if (fault) return { ok: false, fault };
    if (s.dt > 0) s.dt--;
    if (s.st > 0) s.st--;
    return { ok: true, opcode: op };
  }

  private advance(n: 2 | 4 = 2) { this.state.pc = (this.state.pc + n) & 0xFFFF; }
  private skipIf(cond: boolean) { this.advance(cond ? 4 : 2); }

  private bounds(region: BoundsRegion, opcode: Word, address: number): CpuFault {
    return { kind: 'out-of-bounds', region, opcode, pc: this.state.pc, address };
  }

  // Memory window [start, start+len) must sit inside memory
  private windowFault(opcode: Word, start: number, len: number): CpuFault | null {
    return start + len > MEMORY_SIZE ? this.bounds('memory', opcode, start) : null;
  }

  private dispatch(ins: Instruction, opcode: Word): CpuFault | null {
    const s = this.state;
    const v = s.v;
    switch (ins.kind) {
      case 'CLS': this.display.clear(); this.advance(); return null;
      case 'RET': {
        if (s.sp === 0) return this.bounds('stack', opcode, -1);
        s.sp--;
        const ret = s.stack[s.sp];
        s.stack[s.sp] = STACK_SENTINEL;
        // the stack holds the CALL's own address, so resume one instruction later
        s.pc = (ret + 2) & 0xFFFF;
        return null;
      }
      case 'JP': s.pc = ins.nnn; return null;
      case 'CALL': {
        if (s.sp >= STACK_DEPTH) return this.bounds('stack', opcode, s.sp);
        s.stack[s.sp] = s.pc;
        s.sp++;
        s.pc = ins.nnn;
        return null;
      }
      case 'SE_VX_KK': this.skipIf(v[ins.x] === ins.kk); return null;
      case 'SNE_VX_KK': this.skipIf(v[ins.x] !== ins.kk); return null;
      case 'SE_VX_VY': this.skipIf(v[ins.x] === v[ins.y]); return null;
      case 'SNE_VX_VY': this.skipIf(v[ins.x] !== v[ins.y]); return null;
      case 'LD_VX_KK': v[ins.x] = ins.kk; this.advance(); return null;
      case 'ADD_VX_KK': v[ins.x] = (v[ins.x] + ins.kk) & 0xFF; this.advance(); return null;

      // ALU (8xy_). VF is written before Vx, so with x = F the result wins.
      case 'LD_VX_VY': v[ins.x] = v[ins.y]; this.advance(); return null;
      case 'OR': v[ins.x] |= v[ins.y]; this.advance(); return null;
      case 'AND': v[ins.x] &= v[ins.y]; this.advance(); return null;
      case 'XOR': v[ins.x] ^= v[ins.y]; this.advance(); return null;
      case 'ADD_VX_VY': {
        const sum = v[ins.x] + v[ins.y];
        // VF is only ever set here, never cleared
        if (sum > 0xFF) v[FLAG_REGISTER] = 1;
        v[ins.x] = sum & 0xFF;
        this.advance();
        return null;
      }
      case 'SUB': {
        const a = v[ins.x], b = v[ins.y];
        v[FLAG_REGISTER] = a > b ? 1 : 0;
        v[ins.x] = (a - b) & 0xFF;
        this.advance();
        return null;
      }
      case 'SHR': {
        v[FLAG_REGISTER] = v[ins.x] & 0x01;
        v[ins.x] = v[ins.x] >> 1;
        this.advance();
        return null;
      }
      case 'SUBN': {
        const a = v[ins.x], b = v[ins.y];
        v[FLAG_REGISTER] = a > b ? 0 : 1; // borrow clears VF
        v[ins.x] = (b - a) & 0xFF;
        this.advance();
        return null;
      }
      case 'SHL': {
        // raw mask, not normalized to 0/1
        v[FLAG_REGISTER] = v[ins.x] & 0x80;
        v[ins.x] = (v[ins.x] << 1) & 0xFF;
        this.advance();
        return null;
      }

      case 'LD_I': s.i = ins.nnn; this.advance(); return null;
      case 'JP_V0': s.pc = v[0] + ins.nnn; return null;
      case 'RND': {
        let r: Byte;
        try {
          r = this.random.nextByte();
        } catch (cause) {
          return { kind: 'random-source', opcode, pc: s.pc, cause };
        }
        v[ins.x] = r & ins.kk;
        this.advance();
        return null;
      }
      case 'DRW': {
        const f = this.windowFault(opcode, s.i, ins.n);
        if (f) return f;
        const sprite = s.memory.slice(s.i, s.i + ins.n);
        const collided = this.display.draw(v[ins.x], v[ins.y], sprite);
        v[FLAG_REGISTER] = collided ? 1 : 0;
        this.advance();
        return null;
      }
      case 'SKP':
      case 'SKNP': {
        const key = v[ins.x];
        if (key >= KEY_COUNT) return this.bounds('keypad', opcode, key);
        const down = this.keypad.isDown(key);
        this.skipIf(ins.kind === 'SKP' ? down : !down);
        return null;
      }

      // Fx__: every rule ends with pc += 2
      case 'LD_VX_DT': v[ins.x] = s.dt; this.advance(); return null;
      case 'LD_VX_K': {
        // Non-blocking poll; each held key bumps pc again (several keys => several bumps)
        for (let k = 0; k < KEY_COUNT; k++) {
          if (this.keypad.isDown(k)) {
            v[ins.x] = k;
            this.advance();
          }
        }
        this.advance();
        return null;
      }
      case 'LD_DT_VX': s.dt = v[ins.x]; this.advance(); return null;
      case 'LD_ST_VX': s.st = v[ins.x]; this.advance(); return null;
      case 'ADD_I_VX': s.i = (s.i + v[ins.x]) & 0xFFFF; this.advance(); return null;
      case 'LD_F_VX': s.i = v[ins.x] * GLYPH_HEIGHT; this.advance(); return null;
      case 'LD_B_VX': {
        const f = this.windowFault(opcode, s.i, 3);
        if (f) return f;
        const val = v[ins.x];
        s.memory[s.i] = Math.floor(val / 100);
        s.memory[s.i + 1] = Math.floor(val / 10) % 10;
        s.memory[s.i + 2] = (val % 100) % 10;
        this.advance();
        return null;
      }
      case 'LD_MEM_VX': {
        const f = this.windowFault(opcode, s.i, ins.x + 1);
        if (f) return f;
        for (let k = 0; k <= ins.x; k++) s.memory[s.i + k] = v[k];
        this.advance();
        return null;
      }
      case 'LD_VX_MEM': {
        const f = this.windowFault(opcode, s.i, ins.x + 1);
        if (f) return f;
        for (let k = 0; k <= ins.x; k++) v[k] = s.memory[s.i + k];
        this.advance();
        return null;
      }

      case 'UNKNOWN': {
        const pc = s.pc;
        // advance first so a caller that keeps going does not refetch the same word
        this.advance();
        return { kind: 'unrecognized-opcode', opcode, pc };
      }
      default: {
        const unreachable: never = ins;
        return unreachable;
      }
    }
  }
}
