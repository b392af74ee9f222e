import { describe, it, expect } from 'vitest';
import { decode } from '@core/cpu/decode';

describe('decode', () => {
  it('extracts operand fields', () => {
    expect(decode(0xD125)).toEqual({ kind: 'DRW', x: 1, y: 2, n: 5 });
    expect(decode(0x7AFF)).toEqual({ kind: 'ADD_VX_KK', x: 10, kk: 0xFF });
    expect(decode(0x2ABC)).toEqual({ kind: 'CALL', nnn: 0xABC });
    expect(decode(0x8AB6)).toEqual({ kind: 'SHR', x: 10 });
    expect(decode(0xF065)).toEqual({ kind: 'LD_VX_MEM', x: 0 });
  });

  it('recognizes the two fixed 0nnn words only', () => {
    expect(decode(0x00E0)).toEqual({ kind: 'CLS' });
    expect(decode(0x00EE)).toEqual({ kind: 'RET' });
    expect(decode(0x0000)).toEqual({ kind: 'UNKNOWN' });
    expect(decode(0x0123)).toEqual({ kind: 'UNKNOWN' });
  });

  it('treats 5xy_ and 9xy_ alike for any low nibble', () => {
    expect(decode(0x5121)).toEqual({ kind: 'SE_VX_VY', x: 1, y: 2 });
    expect(decode(0x912F)).toEqual({ kind: 'SNE_VX_VY', x: 1, y: 2 });
  });

  it('rejects unknown E and F sub-opcodes', () => {
    expect(decode(0xE19F).kind).toBe('UNKNOWN');
    expect(decode(0xF130).kind).toBe('UNKNOWN');
  });
});
