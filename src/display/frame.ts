export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const PIXEL_COUNT = DISPLAY_WIDTH * DISPLAY_HEIGHT;

// One byte per pixel (0 or 1), row-major: index = y * 64 + x.
export type FrameBuffer = Uint8Array;

export function createFrame(): FrameBuffer {
  return new Uint8Array(PIXEL_COUNT);
}

export function pixelIndex(x: number, y: number): number {
  return (y % DISPLAY_HEIGHT) * DISPLAY_WIDTH + (x % DISPLAY_WIDTH);
}

export function getPixel(frame: FrameBuffer, x: number, y: number): number {
  return frame[pixelIndex(x, y)] & 1;
}

export function countLitPixels(frame: FrameBuffer): number {
  let c = 0;
  for (let i = 0; i < frame.length; i++) if (frame[i]) c++;
  return c;
}

// Text rendering for logs and assertions: '#' lit, '.' dark, one line per row.
export function frameToText(frame: FrameBuffer, on = '#', off = '.'): string[] {
  const rows: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH; x++) line += frame[y * DISPLAY_WIDTH + x] ? on : off;
    rows.push(line);
  }
  return rows;
}
