import type { FrameBuffer } from '../display/frame';

// Host-side collaborators. The driver hands each of them copies, never live machine buffers.

export interface InputPoll {
  readonly keys: readonly boolean[]; // 16 entries, pressed state
  readonly keyDowns: readonly number[]; // keys that went down since the previous poll
  readonly quit: boolean;
}

export interface InputBoundary {
  poll(): InputPoll;
}

export interface DisplayBoundary {
  // Returns true when the host asks to quit.
  present(frame: FrameBuffer): boolean;
}

export interface AudioBoundary {
  setTone(on: boolean): void;
}

export interface Boundaries {
  display?: DisplayBoundary;
  input?: InputBoundary;
  audio?: AudioBoundary;
}
