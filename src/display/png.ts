import fs from 'fs';
import { PNG } from 'pngjs';
import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from './frame';
import type { FrameBuffer } from './frame';

export type Rgb = readonly [number, number, number];

export interface PngOptions {
  scale?: number;
  on?: Rgb;
  off?: Rgb;
}

export function frameToPNG(frame: FrameBuffer, opts: PngOptions = {}): PNG {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const on = opts.on ?? [255, 255, 255];
  const off = opts.off ?? [0, 0, 0];
  const width = DISPLAY_WIDTH * scale;
  const height = DISPLAY_HEIGHT * scale;
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const lit = frame[Math.floor(y / scale) * DISPLAY_WIDTH + Math.floor(x / scale)] !== 0;
      const c = lit ? on : off;
      const o = (y * width + x) * 4;
      png.data[o] = c[0];
      png.data[o + 1] = c[1];
      png.data[o + 2] = c[2];
      png.data[o + 3] = 255;
    }
  }
  return png;
}

export function encodeFramePNG(frame: FrameBuffer, opts: PngOptions = {}): Buffer {
  return PNG.sync.write(frameToPNG(frame, opts));
}

export async function writeFramePNG(path: string, frame: FrameBuffer, opts: PngOptions = {}): Promise<void> {
  const png = frameToPNG(frame, opts);
  await new Promise<void>((resolve, reject) => {
    const s = fs.createWriteStream(path);
    png.pack().pipe(s);
    s.on('finish', () => resolve());
    s.on('error', (e) => reject(e));
  });
}
