import type { IClocked } from '../emulator/types';
import type { MachineState } from '../machine/state';

// Delay and sound timers: each decays by one per timer tick and stops at zero.
export class CountdownTimers implements IClocked {
  constructor(private readonly state: MachineState) {}

  tick(): void {
    if (this.state.DT > 0) this.state.DT = (this.state.DT - 1) & 0xff;
    if (this.state.ST > 0) this.state.ST = (this.state.ST - 1) & 0xff;
  }

  toneActive(): boolean {
    return this.state.ST > 0;
  }
}
