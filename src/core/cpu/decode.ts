import type { Byte, Word } from './types';

// Operand fields of an instruction word:
//   x   = bits 11..8 (register index)
//   y   = bits 7..4  (register index)
//   kk  = bits 7..0  (immediate byte)
//   nnn = bits 11..0 (address)
//   n   = bits 3..0  (sprite height)
export type Instruction =
  | { kind: 'CLS' }
  | { kind: 'RET' }
  | { kind: 'JP'; nnn: Word }
  | { kind: 'CALL'; nnn: Word }
  | { kind: 'SE_VX_KK'; x: number; kk: Byte }
  | { kind: 'SNE_VX_KK'; x: number; kk: Byte }
  | { kind: 'SE_VX_VY'; x: number; y: number }
  | { kind: 'LD_VX_KK'; x: number; kk: Byte }
  | { kind: 'ADD_VX_KK'; x: number; kk: Byte }
  | { kind: 'LD_VX_VY'; x: number; y: number }
  | { kind: 'OR'; x: number; y: number }
  | { kind: 'AND'; x: number; y: number }
  | { kind: 'XOR'; x: number; y: number }
  | { kind: 'ADD_VX_VY'; x: number; y: number }
  | { kind: 'SUB'; x: number; y: number }
  | { kind: 'SHR'; x: number }
  | { kind: 'SUBN'; x: number; y: number }
  | { kind: 'SHL'; x: number }
  | { kind: 'SNE_VX_VY'; x: number; y: number }
  | { kind: 'LD_I'; nnn: Word }
  | { kind: 'JP_V0'; nnn: Word }
  | { kind: 'RND'; x: number; kk: Byte }
  | { kind: 'DRW'; x: number; y: number; n: number }
  | { kind: 'SKP'; x: number }
  | { kind: 'SKNP'; x: number }
  | { kind: 'LD_VX_DT'; x: number }
  | { kind: 'LD_VX_K'; x: number }
  | { kind: 'LD_DT_VX'; x: number }
  | { kind: 'LD_ST_VX'; x: number }
  | { kind: 'ADD_I_VX'; x: number }
  | { kind: 'LD_F_VX'; x: number }
  | { kind: 'LD_B_VX'; x: number }
  | { kind: 'LD_MEM_VX'; x: number }
  | { kind: 'LD_VX_MEM'; x: number }
  | { kind: 'UNKNOWN' };

export function decode(opcode: Word): Instruction {
  const op = opcode & 0xFFFF;
  const x = (op & 0x0F00) >> 8;
  const y = (op & 0x00F0) >> 4;
  const n = op & 0x000F;
  const kk = op & 0x00FF;
  const nnn = op & 0x0FFF;

  switch (op >> 12) {
    case 0x0:
      if (op === 0x00E0) return { kind: 'CLS' };
      if (op === 0x00EE) return { kind: 'RET' };
      return { kind: 'UNKNOWN' };
    case 0x1: return { kind: 'JP', nnn };
    case 0x2: return { kind: 'CALL', nnn };
    case 0x3: return { kind: 'SE_VX_KK', x, kk };
    case 0x4: return { kind: 'SNE_VX_KK', x, kk };
    // 5xy_ and 9xy_ do not inspect the low nibble
    case 0x5: return { kind: 'SE_VX_VY', x, y };
    case 0x6: return { kind: 'LD_VX_KK', x, kk };
    case 0x7: return { kind: 'ADD_VX_KK', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'LD_VX_VY', x, y };
        case 0x1: return { kind: 'OR', x, y };
        case 0x2: return { kind: 'AND', x, y };
        case 0x3: return { kind: 'XOR', x, y };
        case 0x4: return { kind: 'ADD_VX_VY', x, y };
        case 0x5: return { kind: 'SUB', x, y };
        case 0x6: return { kind: 'SHR', x };
        case 0x7: return { kind: 'SUBN', x, y };
        case 0xE: return { kind: 'SHL', x };
        default: return { kind: 'UNKNOWN' };
      }
    case 0x9: return { kind: 'SNE_VX_VY', x, y };
    case 0xA: return { kind: 'LD_I', nnn };
    case 0xB: return { kind: 'JP_V0', nnn };
    case 0xC: return { kind: 'RND', x, kk };
    case 0xD: return { kind: 'DRW', x, y, n };
    case 0xE:
      if (kk === 0x9E) return { kind: 'SKP', x };
      if (kk === 0xA1) return { kind: 'SKNP', x };
      return { kind: 'UNKNOWN' };
    case 0xF:
      switch (kk) {
        case 0x07: return { kind: 'LD_VX_DT', x };
        case 0x0A: return { kind: 'LD_VX_K', x };
        case 0x15: return { kind: 'LD_DT_VX', x };
        case 0x18: return { kind: 'LD_ST_VX', x };
        case 0x1E: return { kind: 'ADD_I_VX', x };
        case 0x29: return { kind: 'LD_F_VX', x };
        case 0x33: return { kind: 'LD_B_VX', x };
        case 0x55: return { kind: 'LD_MEM_VX', x };
        case 0x65: return { kind: 'LD_VX_MEM', x };
        default: return { kind: 'UNKNOWN' };
      }
    default:
      return { kind: 'UNKNOWN' };
  }
}
