import type { Byte, Word } from '@core/cpu/types';
import { decode } from '@core/cpu/decode';
import type { Instruction } from '@core/cpu/decode';

export type ReadByteFn = (addr: Word) => Byte;

export interface DisasmResult {
  opcode: Word;
  mnemonic: string;
  operand: string;
}

function hex2(v: number) { return v.toString(16).toUpperCase().padStart(2, '0'); }
function hex3(v: number) { return v.toString(16).toUpperCase().padStart(3, '0'); }
function hex4(v: number) { return v.toString(16).toUpperCase().padStart(4, '0'); }
const V = (r: number) => 'V' + r.toString(16).toUpperCase();

// Mnemonics follow the common assembler convention (LD/SE/SNE/DRW ...)
function render(ins: Instruction): [string, string] {
  switch (ins.kind) {
    case 'CLS': return ['CLS', ''];
    case 'RET': return ['RET', ''];
    case 'JP': return ['JP', '$' + hex3(ins.nnn)];
    case 'CALL': return ['CALL', '$' + hex3(ins.nnn)];
    case 'SE_VX_KK': return ['SE', `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case 'SNE_VX_KK': return ['SNE', `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case 'SE_VX_VY': return ['SE', `${V(ins.x)}, ${V(ins.y)}`];
    case 'LD_VX_KK': return ['LD', `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case 'ADD_VX_KK': return ['ADD', `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case 'LD_VX_VY': return ['LD', `${V(ins.x)}, ${V(ins.y)}`];
    case 'OR': return ['OR', `${V(ins.x)}, ${V(ins.y)}`];
    case 'AND': return ['AND', `${V(ins.x)}, ${V(ins.y)}`];
    case 'XOR': return ['XOR', `${V(ins.x)}, ${V(ins.y)}`];
    case 'ADD_VX_VY': return ['ADD', `${V(ins.x)}, ${V(ins.y)}`];
    case 'SUB': return ['SUB', `${V(ins.x)}, ${V(ins.y)}`];
    case 'SHR': return ['SHR', V(ins.x)];
    case 'SUBN': return ['SUBN', `${V(ins.x)}, ${V(ins.y)}`];
    case 'SHL': return ['SHL', V(ins.x)];
    case 'SNE_VX_VY': return ['SNE', `${V(ins.x)}, ${V(ins.y)}`];
    case 'LD_I': return ['LD', 'I, $' + hex3(ins.nnn)];
    case 'JP_V0': return ['JP', 'V0, $' + hex3(ins.nnn)];
    case 'RND': return ['RND', `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case 'DRW': return ['DRW', `${V(ins.x)}, ${V(ins.y)}, ${ins.n}`];
    case 'SKP': return ['SKP', V(ins.x)];
    case 'SKNP': return ['SKNP', V(ins.x)];
    case 'LD_VX_DT': return ['LD', `${V(ins.x)}, DT`];
    case 'LD_VX_K': return ['LD', `${V(ins.x)}, K`];
    case 'LD_DT_VX': return ['LD', `DT, ${V(ins.x)}`];
    case 'LD_ST_VX': return ['LD', `ST, ${V(ins.x)}`];
    case 'ADD_I_VX': return ['ADD', `I, ${V(ins.x)}`];
    case 'LD_F_VX': return ['LD', `F, ${V(ins.x)}`];
    case 'LD_B_VX': return ['LD', `B, ${V(ins.x)}`];
    case 'LD_MEM_VX': return ['LD', `[I], ${V(ins.x)}`];
    case 'LD_VX_MEM': return ['LD', `${V(ins.x)}, [I]`];
    case 'UNKNOWN': return ['???', ''];
  }
}

export function disasmWord(opcode: Word): DisasmResult {
  const op = opcode & 0xFFFF;
  const [mnemonic, operand] = render(decode(op));
  return { opcode: op, mnemonic, operand };
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const hi = read(pc & 0xFFFF) & 0xFF;
  const lo = read((pc + 1) & 0xFFFF) & 0xFF;
  return disasmWord((hi << 8) | lo);
}

export function formatListingLine(pc: Word, res: DisasmResult): string {
  const dis = (res.mnemonic + (res.operand ? ' ' + res.operand : '')).trim();
  return `${hex3(pc)}  ${hex4(res.opcode)}  ${dis}`;
}

// Listing of a program image as loaded at `base`; a trailing odd byte is shown as data
export function disassemble(image: Uint8Array, base: Word): string[] {
  const lines: string[] = [];
  let off = 0;
  for (; off + 1 < image.length; off += 2) {
    lines.push(formatListingLine(base + off, disasmWord((image[off] << 8) | image[off + 1])));
  }
  if (off < image.length) lines.push(`${hex3(base + off)}  ${hex2(image[off])}    DB #$${hex2(image[off])}`);
  return lines;
}
