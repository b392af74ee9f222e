#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { Chip8System } from '@core/system/system'
import { runSystem } from '@core/harness/headless'
import { readProgramFile } from '@core/program/loader'
import { SequenceRandomSource } from '@core/cpu/random'
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/display'
import { encodeMonochromePng } from '@utils/png'
import { getEnv, envInt } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM')
  let cycles = envInt('HEADLESS_CYCLES', 10_000)
  let png = getEnv('SCREENSHOT_OUT')
  let scale = envInt('SCREENSHOT_SCALE', 8)
  let keys: number[] = []
  let seed: number[] | null = null
  let onFault: 'halt' | 'continue' = 'halt'
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--cycles=')) cycles = parseInt(a.slice(9), 10)
    else if (a.startsWith('--png=')) png = a.slice(6)
    else if (a.startsWith('--scale=')) scale = parseInt(a.slice(8), 10)
    else if (a.startsWith('--keys=')) keys = a.slice(7).split(',').filter(Boolean).map(k => parseInt(k, 16))
    // Fixed random bytes (hex, comma separated) for reproducible runs
    else if (a.startsWith('--random=')) seed = a.slice(9).split(',').filter(Boolean).map(b => parseInt(b, 16) & 0xFF)
    else if (a === '--continue') onFault = 'continue'
    else if (!a.startsWith('--') && !rom) rom = a
  }
  if (!Number.isFinite(cycles) || cycles <= 0) cycles = 10_000
  if (!Number.isFinite(scale) || scale <= 0) scale = 8
  return { rom, cycles, png, scale, keys, seed, onFault }
}

async function main() {
  const args = parseArgs()
  if (!args.rom) { console.error('Usage: tsx scripts/run-headless.ts --rom=<path> [--cycles=N] [--png=out.png] [--keys=1,a] [--random=3f,00] [--continue]'); process.exit(2) }
  const image = readProgramFile(args.rom)
  const sys = new Chip8System({ random: args.seed ? new SequenceRandomSource(args.seed) : undefined })
  sys.loadProgram(image)
  const t0 = performance.now()
  const res = runSystem(sys, { maxCycles: args.cycles, onFault: args.onFault, keys: args.keys })
  const ms = performance.now() - t0
  if (args.png && sys.framebuffer) {
    const buf = encodeMonochromePng(sys.framebuffer.getFrameBuffer(), SCREEN_WIDTH, SCREEN_HEIGHT, { scale: args.scale })
    fs.mkdirSync(path.dirname(path.resolve(args.png)), { recursive: true })
    fs.writeFileSync(args.png, buf)
  }
  console.log(JSON.stringify({
    rom: path.basename(args.rom),
    cycles: res.cycles,
    reason: res.reason,
    faults: res.faultCount,
    message: res.message,
    frame_crc: res.frameCrc.toString(16).padStart(8, '0'),
    ms: +ms.toFixed(1),
    png: args.png ?? undefined,
  }))
  process.exit(res.reason === 'fault' ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
