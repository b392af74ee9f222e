export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export type PixelValue = 0 | 1;

// Output surface consumed by the interpreter. Coordinates passed to draw() may
// exceed the screen; implementations wrap them.
export interface Display {
  clear(): void;
  // XOR-draws one 8-pixel row per sprite byte (MSB leftmost); true if a lit pixel was turned off
  draw(x: number, y: number, sprite: Uint8Array): boolean;
  setPixel(x: number, y: number, value: PixelValue): void;
  getPixel(x: number, y: number): boolean;
}
