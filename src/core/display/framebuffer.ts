import { SCREEN_HEIGHT, SCREEN_WIDTH } from './display';
import type { Display, PixelValue } from './display';

export class FrameBuffer implements Display {
  // Row-major, one byte (0/1) per pixel
  private pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private dirty = false;

  clear(): void {
    this.pixels.fill(0);
    this.dirty = true;
  }

  draw(x: number, y: number, sprite: Uint8Array): boolean {
    let collision = false;
    for (let row = 0; row < sprite.length; row++) {
      const bits = sprite[row];
      for (let col = 0; col < 8; col++) {
        if (((bits >> (7 - col)) & 1) === 0) continue;
        const px = (x + col) % SCREEN_WIDTH;
        const py = (y + row) % SCREEN_HEIGHT;
        const old = this.getPixel(px, py);
        if (old) collision = true;
        this.setPixel(px, py, old ? 0 : 1);
      }
    }
    this.dirty = true;
    return collision;
  }

  setPixel(x: number, y: number, value: PixelValue): void {
    this.pixels[x + y * SCREEN_WIDTH] = value;
  }

  getPixel(x: number, y: number): boolean {
    return this.pixels[x + y * SCREEN_WIDTH] === 1;
  }

  // Expose the live pixel buffer (do not mutate)
  getFrameBuffer(): Uint8Array {
    return this.pixels;
  }

  // Returns whether anything was drawn or cleared since the last call
  takeDirty(): boolean {
    const d = this.dirty;
    this.dirty = false;
    return d;
  }
}
