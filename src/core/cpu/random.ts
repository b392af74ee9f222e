import { randomBytes } from 'node:crypto';
import type { Byte } from './types';

export interface RandomSource {
  nextByte(): Byte;
}

// Draws from the OS CSPRNG; errors from the underlying source propagate to the caller.
export class CryptoRandomSource implements RandomSource {
  private pool = new Uint8Array(0);
  private offset = 0;

  constructor(private readonly poolSize = 256) {}

  nextByte(): Byte {
    if (this.offset >= this.pool.length) {
      this.pool = randomBytes(this.poolSize);
      this.offset = 0;
    }
    return this.pool[this.offset++];
  }
}

// Replays a fixed byte sequence (cycling); for tests and reproducible headless runs.
export class SequenceRandomSource implements RandomSource {
  private index = 0;

  constructor(private readonly bytes: readonly Byte[]) {
    if (bytes.length === 0) throw new Error('SequenceRandomSource needs at least one byte');
  }

  nextByte(): Byte {
    const b = this.bytes[this.index % this.bytes.length];
    this.index++;
    return b & 0xFF;
  }
}
