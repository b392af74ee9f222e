export type Byte = number; // 0..255
export type Word = number; // 0..65535

export const MEMORY_SIZE = 0x1000; // 4KB
export const PROGRAM_START = 0x200;
export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const KEY_COUNT = 16;
export const FLAG_REGISTER = 0xF;

// Written into a stack slot once its return address has been popped
export const STACK_SENTINEL = 0xBEEF;

export interface MachineState {
  memory: Uint8Array; // 0x000..0xFFF, font at 0x000..0x04F
  v: Uint8Array; // V0..VF
  i: Word; // index register
  pc: Word; // program counter
  stack: Uint16Array; // return addresses (call-site pc)
  sp: Byte; // stack pointer
  dt: Byte; // delay timer
  st: Byte; // sound timer
}

export function createMachineState(): MachineState {
  return {
    memory: new Uint8Array(MEMORY_SIZE),
    v: new Uint8Array(REGISTER_COUNT),
    i: 0,
    pc: 0,
    stack: new Uint16Array(STACK_DEPTH),
    sp: 0,
    dt: 0,
    st: 0,
  };
}
