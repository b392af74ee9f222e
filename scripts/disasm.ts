#!/usr/bin/env node
/* eslint-disable no-console */
import { readProgramFile } from '@core/program/loader'
import { PROGRAM_START } from '@core/cpu/types'
import { disassemble } from '@utils/disasm'
import { getEnv } from '@utils/env'

function usage(): never {
  console.error('Usage: tsx scripts/disasm.ts <rom> [--base=200]')
  process.exit(2)
}

const argv = process.argv.slice(2)
let rom = getEnv('ROM')
let base = PROGRAM_START
for (const a of argv) {
  if (a.startsWith('--base=')) base = parseInt(a.slice(7), 16) & 0xFFF
  else if (!a.startsWith('--')) rom = a
}
if (!rom) usage()

try {
  for (const line of disassemble(readProgramFile(rom), base)) console.log(line)
} catch (e) {
  console.error(e instanceof Error ? e.message : e)
  process.exit(1)
}
