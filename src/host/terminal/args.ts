import type { FaultPolicy } from '@core/system/system';
import { getEnv } from '@utils/env';

export interface HostArgs {
  rom: string | null;
  cycleMs: number;
  onFault: FaultPolicy;
  maxCycles: number; // 0 = run until quit
  holdMs: number;
}

function positiveInt(flag: string, raw: string, allowZero: boolean): number {
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0 || (!allowZero && n === 0)) throw new Error(`Invalid value for ${flag}: '${raw}'`);
  return n;
}

// Arguments win over the environment (ROM, CYCLE_MS); at most one bare argument, taken as the ROM
export function parseArgs(argv: string[]): HostArgs {
  const args: HostArgs = {
    rom: getEnv('ROM'),
    cycleMs: positiveInt('CYCLE_MS', getEnv('CYCLE_MS') ?? '8', false),
    onFault: 'halt',
    maxCycles: 0,
    holdMs: 150,
  };
  let positional: string | null = null;
  for (const a of argv) {
    if (a.startsWith('--rom=')) args.rom = a.slice(6);
    else if (a.startsWith('--cycle-ms=')) args.cycleMs = positiveInt('--cycle-ms', a.slice(11), false);
    else if (a.startsWith('--max-cycles=')) args.maxCycles = positiveInt('--max-cycles', a.slice(13), true);
    else if (a.startsWith('--hold-ms=')) args.holdMs = positiveInt('--hold-ms', a.slice(10), false);
    else if (a.startsWith('--on-fault=')) {
      const p = a.slice(11);
      if (p !== 'halt' && p !== 'continue') throw new Error(`Invalid value for --on-fault: '${p}'`);
      args.onFault = p;
    } else if (!a.startsWith('--') && positional === null) {
      positional = a;
      args.rom = a;
    } else throw new Error(`Unknown argument: ${a}`);
  }
  return args;
}
