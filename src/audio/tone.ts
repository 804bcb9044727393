import type { AudioBoundary } from '../emulator/boundaries';

// Terminal bell on every rising edge of the tone signal.
export class BellAudio implements AudioBoundary {
  private on = false;

  constructor(private readonly write: (s: string) => void = (s) => { process.stdout.write(s); }) {}

  get active(): boolean {
    return this.on;
  }

  setTone(on: boolean): void {
    if (on && !this.on) this.write('\x07');
    this.on = on;
  }
}

// Records every tone transition, for tests and headless runs.
export class ToneRecorder implements AudioBoundary {
  readonly transitions: boolean[] = [];

  get active(): boolean {
    return this.transitions.length > 0 && this.transitions[this.transitions.length - 1];
  }

  setTone(on: boolean): void {
    this.transitions.push(on);
  }
}
