import type { DisplayBoundary } from '../emulator/boundaries';
import { createFrame } from './frame';
import type { FrameBuffer } from './frame';

// Headless display: keeps a private copy of the latest frame and asks to quit
// once the frame budget is spent.
export class FrameRecorder implements DisplayBoundary {
  private last: FrameBuffer = createFrame();
  private count = 0;

  constructor(private readonly maxFrames = Infinity, private readonly onFrame?: (frame: FrameBuffer, index: number) => void) {}

  get frames(): number {
    return this.count;
  }

  get lastFrame(): FrameBuffer {
    return this.last;
  }

  present(frame: FrameBuffer): boolean {
    this.last = frame.slice();
    this.count++;
    this.onFrame?.(this.last, this.count - 1);
    return this.count >= this.maxFrames;
  }
}
