import { describe, it, expect } from 'vitest';
import { bareCpu, cpuWithProgram } from '../helpers/cpuh';

describe('CPU loads and index register', () => {
  it('6xkk loads an immediate', () => {
    const { cpu } = bareCpu();
    cpu.execute(0x61AA);
    expect(cpu.state.v[1]).toBe(0xAA);
    expect(cpu.state.pc).toBe(2);
    cpu.execute(0x621A);
    expect(cpu.state.v[2]).toBe(0x1A);
    expect(cpu.state.pc).toBe(4);
    cpu.execute(0x6A15);
    expect(cpu.state.v[10]).toBe(0x15);
    expect(cpu.state.pc).toBe(6);
  });

  it('Annn sets I to the low 12 bits', () => {
    const { cpu } = bareCpu();
    cpu.execute(0xAFAF);
    expect(cpu.state.i).toBe(0xFAF);
    expect(cpu.state.pc).toBe(2);
  });

  it('Fx1E adds Vx to I', () => {
    const { cpu } = bareCpu();
    cpu.state.i = 0x300;
    cpu.state.v[3] = 0x20;
    cpu.execute(0xF31E);
    expect(cpu.state.i).toBe(0x320);
  });

  it('Fx1E wraps I at 16 bits', () => {
    const { cpu } = bareCpu();
    cpu.state.i = 0xFFFF;
    cpu.state.v[0] = 2;
    cpu.execute(0xF01E);
    expect(cpu.state.i).toBe(1);
  });

  it('Fx29 points I at the glyph for Vx', () => {
    const { cpu } = cpuWithProgram([]);
    cpu.state.v[2] = 0xA;
    cpu.execute(0xF229);
    expect(cpu.state.i).toBe(50);
    expect(Array.from(cpu.state.memory.slice(50, 55))).toEqual([0xF0, 0x90, 0xF0, 0x90, 0x90]);
  });
});

describe('CPU BCD and register block transfer', () => {
  it.each([
    [234, [2, 3, 4]],
    [7, [0, 0, 7]],
    [100, [1, 0, 0]],
    [255, [2, 5, 5]],
  ])('Fx33 stores the digits of %i', (val, digits) => {
    const { cpu } = bareCpu();
    cpu.state.i = 0x300;
    cpu.state.v[2] = val;
    cpu.execute(0xF233);
    expect(Array.from(cpu.state.memory.slice(0x300, 0x303))).toEqual(digits);
    expect(cpu.state.i).toBe(0x300);
  });

  it('Fx55 stores V0..Vx and leaves I alone', () => {
    const { cpu } = bareCpu();
    const v = cpu.state.v;
    v[0] = 5; v[1] = 4; v[2] = 3; v[3] = 2;
    cpu.state.i = 0x300;
    cpu.execute(0xF255);
    expect(Array.from(cpu.state.memory.slice(0x300, 0x304))).toEqual([5, 4, 3, 0]);
    expect(cpu.state.i).toBe(0x300);
  });

  it('Fx65 reads back what Fx55 stored, leaving higher registers alone', () => {
    const { cpu } = bareCpu();
    const v = cpu.state.v;
    v[0] = 5; v[1] = 4; v[2] = 3;
    cpu.state.i = 0x300;
    cpu.execute(0xF255);
    v.fill(0);
    v[3] = 9;
    cpu.execute(0xF265);
    expect(Array.from(v.slice(0, 4))).toEqual([5, 4, 3, 9]);
    expect(cpu.state.i).toBe(0x300);
  });

  it('Fx55 with x = F stores all sixteen registers', () => {
    const { cpu } = bareCpu();
    for (let k = 0; k < 16; k++) cpu.state.v[k] = k + 1;
    cpu.state.i = 0x400;
    cpu.execute(0xFF55);
    expect(cpu.state.memory[0x400]).toBe(1);
    expect(cpu.state.memory[0x40F]).toBe(16);
    expect(cpu.state.memory[0x410]).toBe(0);
  });
});

describe('CPU timers', () => {
  it('Fx15 sets DT, then the same cycle ticks it once', () => {
    const { cpu } = bareCpu();
    cpu.state.v[1] = 10;
    cpu.execute(0xF115);
    expect(cpu.state.dt).toBe(9);
  });

  it('Fx18 sets ST, then the same cycle ticks it once', () => {
    const { cpu } = bareCpu();
    cpu.state.v[1] = 10;
    cpu.execute(0xF118);
    expect(cpu.state.st).toBe(9);
  });

  it('Fx07 reads DT before the tick', () => {
    const { cpu } = bareCpu();
    cpu.state.dt = 5;
    cpu.execute(0xF307);
    expect(cpu.state.v[3]).toBe(5);
    expect(cpu.state.dt).toBe(4);
  });

  it('timers count down once per successful instruction and stop at zero', () => {
    const { cpu } = bareCpu();
    cpu.state.dt = 3;
    cpu.state.st = 1;
    for (let k = 0; k < 3; k++) cpu.execute(0x6000);
    expect(cpu.state.dt).toBe(0);
    expect(cpu.state.st).toBe(0);
    cpu.execute(0x6000);
    expect(cpu.state.dt).toBe(0);
  });

  it('timers also tick on instructions that set pc directly', () => {
    const { cpu } = bareCpu();
    cpu.state.dt = 10;
    cpu.state.st = 10;
    for (const op of [0x2300, 0x00EE, 0x1300, 0xB300]) expect(cpu.execute(op).ok).toBe(true);
    expect(cpu.state.dt).toBe(6);
    expect(cpu.state.st).toBe(6);
  });

  it('a faulting instruction does not tick timers', () => {
    const { cpu } = bareCpu();
    cpu.state.dt = 3;
    cpu.state.st = 2;
    cpu.execute(0x0123);
    expect(cpu.state.dt).toBe(3);
    expect(cpu.state.st).toBe(2);
  });
});
