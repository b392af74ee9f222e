import fs from 'node:fs';
import { MEMORY_SIZE, PROGRAM_START } from '@core/cpu/types';

// Everything from the load address to the end of memory
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START; // 0x0E00

export class ProgramLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProgramLoadError';
  }
}

export function validateProgram(image: Uint8Array): void {
  if (image.length === 0) throw new ProgramLoadError('Program image is empty');
  if (image.length > MAX_PROGRAM_SIZE) {
    throw new ProgramLoadError(`Program image is ${image.length} bytes; at most ${MAX_PROGRAM_SIZE} fit above $${PROGRAM_START.toString(16)}`);
  }
}

export function readProgramFile(path: string): Uint8Array {
  if (!fs.existsSync(path)) throw new ProgramLoadError(`ROM not found: ${path}`);
  const image = new Uint8Array(fs.readFileSync(path));
  validateProgram(image);
  return image;
}
