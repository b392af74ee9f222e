import { KEY_COUNT } from '@core/cpu/types';

// Logical 16-key pad (0x0..0xF). The host decides which physical keys map to
// which index; this only stores the pressed set for the current cycle.
export interface KeyState {
  setPressed(indices: Iterable<number>): void;
  isDown(index: number): boolean;
}

function checkIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
    throw new RangeError(`Key index out of range: ${index}`);
  }
}

export class Keypad implements KeyState {
  private keys: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  // Replaces the whole set: keys absent from `indices` are released
  setPressed(indices: Iterable<number>): void {
    const next = new Array<boolean>(KEY_COUNT).fill(false);
    for (const i of indices) {
      checkIndex(i);
      next[i] = true;
    }
    this.keys = next;
  }

  isDown(index: number): boolean {
    checkIndex(index);
    return this.keys[index];
  }

  pressed(): number[] {
    const out: number[] = [];
    for (let i = 0; i < KEY_COUNT; i++) if (this.keys[i]) out.push(i);
    return out;
  }
}
