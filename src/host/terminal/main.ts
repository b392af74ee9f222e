#!/usr/bin/env node
/* eslint-disable no-console */
import { Chip8System } from '@core/system/system';
import { describeFault, formatFault } from '@core/cpu/faults';
import { readProgramFile } from '@core/program/loader';
import { parseArgs } from './args';
import { DEFAULT_KEYMAP, mapKeys } from './keymap';
import { HeldKeys } from './heldKeys';
import { readInputChunk } from './input';
import { renderFrame } from './render';

const CSI = '\x1b[';

function usage(): never {
  console.error('Usage: tsx src/host/terminal/main.ts --rom=<path> [--cycle-ms=8] [--on-fault=halt|continue] [--max-cycles=N] [--hold-ms=150]');
  process.exit(2);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.rom) usage();
  const image = readProgramFile(args.rom);

  const sys = new Chip8System();
  sys.loadProgram(image);
  const fb = sys.framebuffer;
  if (!fb) throw new Error('terminal host needs the built-in framebuffer');
  console.log(`[loader] ROM loaded: ${args.rom} (${image.length} bytes)`);

  const stdin = process.stdin;
  const out = process.stdout;
  const held = new HeldKeys(args.holdMs);
  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.setEncoding('utf8');

  out.write(`${CSI}?25l${CSI}2J`);
  const restore = () => { out.write(`${CSI}?25h\n`); if (stdin.isTTY) stdin.setRawMode(false); stdin.pause(); };

  return await new Promise<number>((resolve) => {
    let cycles = 0;
    let faults = 0;
    let done = false;
    const finish = (code: number, msg?: string) => {
      if (done) return;
      done = true;
      clearInterval(timer);
      restore();
      if (msg) console.error(msg);
      console.log(`[host] stopped after ${cycles} cycles (${faults} faults)`);
      resolve(code);
    };
    stdin.on('data', (chunk: string) => {
      const input = readInputChunk(chunk);
      if (input.quit) { finish(0); return; }
      const now = Date.now();
      for (const k of input.keys) held.press(k, now);
    });
    const timer = setInterval(() => {
      sys.setPressedKeys(mapKeys(DEFAULT_KEYMAP, held.held(Date.now())));
      const r = sys.stepCycle();
      cycles++;
      if (!r.ok) {
        faults++;
        if (args.onFault === 'halt') { finish(1, `[cpu] ${formatFault(r.fault, sys.cpu.state)}`); return; }
        console.error(`[cpu] ${describeFault(r.fault)} (continuing)`);
      }
      if (fb.takeDirty()) out.write(`${CSI}H${renderFrame(fb.getFrameBuffer()).join('\n')}`);
      if (args.maxCycles > 0 && cycles >= args.maxCycles) finish(0);
    }, args.cycleMs);
  });
}

main().then((code) => process.exit(code)).catch((e) => { console.error(e); process.exit(1); });
