import { PNG } from 'pngjs';

export type Rgb = [number, number, number];

export interface PngOptions {
  scale?: number;
  on?: Rgb;
  off?: Rgb;
}

// Encode a 1-byte-per-pixel (0/1) monochrome buffer as a scaled RGBA PNG
export function encodeMonochromePng(pixels: Uint8Array, w: number, h: number, opts: PngOptions = {}): Buffer {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const on = opts.on ?? [255, 255, 255];
  const off = opts.off ?? [0, 0, 0];
  const W = w * scale, H = h * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const [r, g, b] = pixels[y * w + x] ? on : off;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return PNG.sync.write(png);
}
