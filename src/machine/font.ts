import fontData from './font.json';

export const FONT_BASE = 0x000;
export const GLYPH_HEIGHT = fontData.glyphHeight;

// 16 hex-digit glyphs, 5 rows each, packed back to back (0x000-0x04F).
export const FONT_TABLE: Uint8Array = (() => {
  const out = new Uint8Array(fontData.glyphs.length * GLYPH_HEIGHT);
  fontData.glyphs.forEach((rows, digit) => {
    if (rows.length !== GLYPH_HEIGHT) throw new Error(`font glyph ${digit.toString(16)} has ${rows.length} rows`);
    out.set(rows, digit * GLYPH_HEIGHT);
  });
  return out;
})();

export function glyphAddress(digit: number): number {
  return FONT_BASE + digit * GLYPH_HEIGHT;
}
