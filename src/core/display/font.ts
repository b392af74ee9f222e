import fontData from './font.json';

export const FONT_BASE = 0x000;
export const GLYPH_HEIGHT = fontData.glyphHeight;

function buildFontSet(): Uint8Array {
  const out = new Uint8Array(16 * GLYPH_HEIGHT);
  const seen = new Set<number>();
  for (const glyph of fontData.glyphs) {
    const digit = parseInt(glyph.digit, 16);
    if (!Number.isInteger(digit) || digit < 0 || digit > 0xF || seen.has(digit)) {
      throw new Error(`font.json: bad glyph digit '${glyph.digit}'`);
    }
    if (glyph.rows.length !== GLYPH_HEIGHT) {
      throw new Error(`font.json: glyph ${glyph.digit} has ${glyph.rows.length} rows, expected ${GLYPH_HEIGHT}`);
    }
    seen.add(digit);
    glyph.rows.forEach((row, k) => { out[digit * GLYPH_HEIGHT + k] = parseInt(row, 16) & 0xFF; });
  }
  if (seen.size !== 16) throw new Error(`font.json: expected 16 glyphs, found ${seen.size}`);
  return out;
}

// 80 bytes, glyphs 0..F, 5 rows each; installed at FONT_BASE on reset
export const FONT_SET: Uint8Array = buildFontSet();
