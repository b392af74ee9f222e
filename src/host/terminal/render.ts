import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/display';

// Two pixel rows per text line: top half, bottom half, both, neither
const GLYPHS = [' ', '▀', '▄', '█'] as const;

export function renderFrame(pixels: Uint8Array, w = SCREEN_WIDTH, h = SCREEN_HEIGHT): string[] {
  const lines: string[] = [];
  for (let y = 0; y < h; y += 2) {
    let line = '';
    for (let x = 0; x < w; x++) {
      const top = pixels[y * w + x] ? 1 : 0;
      const bottom = y + 1 < h && pixels[(y + 1) * w + x] ? 2 : 0;
      line += GLYPHS[top | bottom];
    }
    lines.push(line);
  }
  return lines;
}
