import { parseArgs } from '../src/config';
import { loadRomFile, RomLoadError } from '../src/cart/loader';
import { disassembleProgram, formatOpcode } from '../src/cpu/disasm';
import { PROGRAM_START } from '../src/bus/memory';

const { options, positionals } = parseArgs(process.argv.slice(2));
const romPath = options.rom ?? positionals[0];
if (!romPath) {
  console.error('Usage: npm run disasm -- --rom=path/to/game.ch8');
  process.exit(1);
}

try {
  const rom = loadRomFile(romPath);
  for (const line of disassembleProgram(rom, PROGRAM_START)) {
    console.log(`${line.addr.toString(16).toUpperCase().padStart(3, '0')}: ${formatOpcode(line.op)}  ${line.text}`);
  }
} catch (e) {
  if (e instanceof RomLoadError) {
    console.error(`[disasm] ${e.message}`);
    process.exit(1);
  }
  throw e;
}
