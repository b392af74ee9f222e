import { describe, it, expect } from 'vitest';
import { bareCpu, cpuWithProgram } from '../helpers/cpuh';
import { CpuFaultError, describeFault, formatFault } from '@core/cpu/faults';
import { createMachineState } from '@core/cpu/types';

describe('CPU faults', () => {
  it('an unrecognized opcode reports the pre-advance pc and still advances', () => {
    const { cpu } = bareCpu();
    const r = cpu.execute(0x0123);
    expect(r).toEqual({ ok: false, fault: { kind: 'unrecognized-opcode', opcode: 0x0123, pc: 0 } });
    expect(cpu.state.pc).toBe(2);
  });

  it.each([0x0000, 0x00E1, 0xE1FF, 0xF1FF, 0x800F])('%i is unrecognized', (op) => {
    const { cpu } = bareCpu();
    const r = cpu.execute(op);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fault.kind).toBe('unrecognized-opcode');
  });

  it('RET on an empty stack is a stack fault', () => {
    const { cpu } = bareCpu();
    const r = cpu.execute(0x00EE);
    expect(r).toEqual({
      ok: false,
      fault: { kind: 'out-of-bounds', region: 'stack', opcode: 0x00EE, pc: 0, address: -1 },
    });
    expect(cpu.state.pc).toBe(0);
    expect(cpu.state.sp).toBe(0);
  });

  it('a 17th nested CALL is a stack fault', () => {
    const { cpu } = bareCpu();
    cpu.state.pc = 0x300;
    for (let k = 0; k < 16; k++) cpu.execute(0x2300);
    const r = cpu.execute(0x2300);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fault).toMatchObject({ kind: 'out-of-bounds', region: 'stack', address: 16 });
    expect(cpu.state.sp).toBe(16);
  });

  it('fetching the last byte of memory faults during fetch', () => {
    const { cpu } = bareCpu();
    cpu.state.pc = 0xFFF;
    const r = cpu.step();
    expect(r).toEqual({
      ok: false,
      fault: { kind: 'out-of-bounds', region: 'memory', opcode: null, pc: 0xFFF, address: 0xFFF },
    });
  });

  it('Fx55 past the end of memory writes nothing', () => {
    const { cpu } = bareCpu();
    cpu.state.i = 0xFFE;
    cpu.state.v.fill(0xAA);
    const r = cpu.execute(0xF255);
    expect(r.ok).toBe(false);
    expect(cpu.state.memory[0xFFE]).toBe(0);
    expect(cpu.state.memory[0xFFF]).toBe(0);
    expect(cpu.state.pc).toBe(0);
  });

  it('Fx33 past the end of memory faults', () => {
    const { cpu } = bareCpu();
    cpu.state.i = 0xFFE;
    expect(cpu.execute(0xF033).ok).toBe(false);
    cpu.state.i = 0xFFD;
    expect(cpu.execute(0xF033).ok).toBe(true);
  });
});

describe('fault formatting', () => {
  it('describes each fault kind', () => {
    expect(describeFault({ kind: 'unrecognized-opcode', opcode: 0x0123, pc: 0x200 }))
      .toBe('Unrecognized opcode $0123 at $200');
    expect(describeFault({ kind: 'out-of-bounds', region: 'memory', opcode: 0xF255, pc: 0x204, address: 0xFFE }))
      .toBe('Out-of-bounds memory access ($FFE) by opcode $F255 at $204');
    expect(describeFault({ kind: 'out-of-bounds', region: 'stack', opcode: 0x00EE, pc: 0x200, address: -1 }))
      .toBe('Out-of-bounds stack access (-1) by opcode $00EE at $200');
    expect(describeFault({ kind: 'out-of-bounds', region: 'memory', opcode: null, pc: 0xFFF, address: 0xFFF }))
      .toBe('Out-of-bounds memory access ($FFF) during fetch at $FFF');
    expect(describeFault({ kind: 'random-source', opcode: 0xC1FF, pc: 0x200, cause: new Error('boom') }))
      .toBe('Random source failed for opcode $C1FF at $200: boom');
  });

  it('dumps registers, memory around pc and the stack', () => {
    const s = createMachineState();
    s.v[0] = 0x12;
    s.pc = 0x202;
    s.i = 0x300;
    s.sp = 1;
    s.stack[0] = 0x200;
    s.memory[0x200] = 0x22;
    s.memory[0x201] = 0x02;
    const lines = formatFault({ kind: 'unrecognized-opcode', opcode: 0x0000, pc: 0x202 }, s).split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('Unrecognized opcode $0000 at $202');
    expect(lines[1]).toBe(
      'Regs: V0=12 V1=00 V2=00 V3=00 V4=00 V5=00 V6=00 V7=00 V8=00 V9=00 VA=00 VB=00 VC=00 VD=00 VE=00 VF=00'
      + ' I=0300 PC=0202 SP=1 DT=0 ST=0'
    );
    expect(lines[2]).toBe('Mem[$1FA..]: 00 00 00 00 00 00 22 02 00 00 00 00 00 00 00 00 00 00');
    expect(lines[3]).toBe('Stack[SP=1]: $200');
  });

  it('CpuFaultError carries the fault and a dump when given state', () => {
    const { cpu } = cpuWithProgram([0x0000]);
    const r = cpu.step();
    expect(r.ok).toBe(false);
    if (r.ok) return;
    const err = new CpuFaultError(r.fault, cpu.state);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('CpuFaultError');
    expect(err.fault).toBe(r.fault);
    expect(err.message.split('\n')[0]).toBe('Unrecognized opcode $0000 at $200');
    expect(err.message.split('\n')[3]).toBe('Stack[SP=0]: (empty)');
    expect(new CpuFaultError(r.fault).message).toBe('Unrecognized opcode $0000 at $200');
  });
});
