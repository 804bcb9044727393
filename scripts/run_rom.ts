import { parseArgs, parseFlag, resolveConfig, ConfigError } from '../src/config';
import type { EmulatorConfig } from '../src/config';
import { loadRomFile, RomLoadError } from '../src/cart/loader';
import { Emulator } from '../src/emulator/core';
import { Chip8FaultError } from '../src/cpu/faults';
import { runRealtime } from '../src/emulator/runner';
import type { HaltReason } from '../src/emulator/scheduler';
import { ScriptedKeypad, parseKeyScript } from '../src/input/keypad';
import type { KeyEvent } from '../src/input/keypad';
import { FrameRecorder } from '../src/display/recorder';
import { writeFramePNG } from '../src/display/png';
import { frameToText } from '../src/display/frame';
import { BellAudio, ToneRecorder } from '../src/audio/tone';
import { formatRegisters, hexDump } from '../src/tools/dump';
import { frameHash } from '../src/utils/hash';
import { PROGRAM_START } from '../src/bus/memory';

const USAGE = 'Usage: npm start -- --rom=path/to/game.ch8 [--ips=600] [--frames=600] [--realtime=0|1] [--out=screen.png] [--scale=8] [--keys=tick:key[:hold],...] [--bell=0|1] [--dump=0|1] [--trace=N] [--addiVf=0|1] [--onFault=halt|throw]';

const EXIT_OK = 0;
const EXIT_LOAD_FAILURE = 1;
const EXIT_FAULT = 2;

async function main(): Promise<number> {
  const { options, positionals } = parseArgs(process.argv.slice(2));
  const romPath = options.rom ?? positionals[0] ?? process.env.CHIP8_ROM;
  if (!romPath) {
    console.error(USAGE);
    return EXIT_LOAD_FAILURE;
  }

  let keys: KeyEvent[];
  let config: EmulatorConfig;
  try {
    config = resolveConfig(process.env, options);
    keys = parseKeyScript(options.keys ?? '');
  } catch (e) {
    if (e instanceof ConfigError || e instanceof SyntaxError) {
      console.error(`[run] ${e.message}`);
      console.error(USAGE);
      return EXIT_LOAD_FAILURE;
    }
    throw e;
  }

  const realtime = parseFlag(options.realtime, false);
  const frames = Number.isFinite(Number(options.frames)) ? Math.max(1, Number(options.frames)) : 600;
  const scale = Number.isFinite(Number(options.scale)) ? Math.max(1, Number(options.scale)) : 8;
  const outPath = options.out;
  const dump = parseFlag(options.dump, false);

  let rom: Uint8Array;
  try {
    rom = loadRomFile(romPath);
  } catch (e) {
    if (e instanceof RomLoadError) {
      console.error(`[run] ${e.message}`);
      return EXIT_LOAD_FAILURE;
    }
    throw e;
  }

  console.log(`[run] ROM: ${romPath} (${rom.length} bytes)  ips=${config.instructionsPerSecond}  timerHz=${config.timerHz}  realtime=${realtime}  frames=${realtime ? 'unbounded' : frames}`);

  const input = new ScriptedKeypad(keys);
  const display = new FrameRecorder();
  const audio = parseFlag(options.bell, realtime) ? new BellAudio() : new ToneRecorder();
  const emu = Emulator.fromRom(rom, { config, io: { input, display, audio } });
  const sched = emu.scheduler;

  let reason: HaltReason | undefined;
  if (realtime) {
    process.once('SIGINT', () => input.requestQuit());
    reason = await runRealtime(sched);
  } else {
    // Headless: a fixed number of timer periods, then quit.
    for (let i = 0; i < frames && !sched.isHalted(); i++) sched.runFrame();
    reason = sched.haltReason() ?? { kind: 'UserQuit' };
  }

  const frame = display.lastFrame;
  console.log(`[run] executed=${sched.executedInstructions} frames=${sched.presentedFrames} screen=${frameHash(frame)}`);
  if (!outPath) {
    for (const line of frameToText(frame)) console.log(line);
  } else {
    await writeFramePNG(outPath, frame, { scale });
    console.log(`[run] wrote ${outPath}`);
  }
  if (dump) {
    for (const line of formatRegisters(emu.state.snapshot())) console.log(`[run] ${line}`);
    for (const problem of emu.state.checkInvariants()) console.warn(`[run] invariant violated: ${problem}`);
    for (const line of hexDump(emu.state.memory.slice(PROGRAM_START, emu.state.romSize), PROGRAM_START)) console.log(line);
  }
  for (const { op, count } of emu.cpu.getUnknownOpcodeStats()) {
    console.log(`[run] unknown opcode ${op.toString(16).padStart(4, '0')} x${count}`);
  }

  return reason.kind === 'Fault' ? EXIT_FAULT : EXIT_OK;
}

main().then(
  (code) => { process.exitCode = code; },
  (e) => {
    if (e instanceof Chip8FaultError) console.error(`[run] ${e.message}`);
    else console.error('[run] Unhandled error:', e);
    process.exitCode = EXIT_FAULT;
  },
);
