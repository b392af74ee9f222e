const CTRL_C = '\u0003';
const ESC = '\u001b';

export interface InputChunk {
  quit: boolean;
  keys: string[]; // lowercased key names, in arrival order
}

// Raw-mode stdin delivers escape sequences (arrows, function keys, Alt+key)
// as one ESC-prefixed chunk; only a lone ESC or Ctrl-C quits.
export function readInputChunk(chunk: string): InputChunk {
  if (chunk.includes(CTRL_C) || chunk === ESC) return { quit: true, keys: [] };
  if (chunk.startsWith(ESC)) return { quit: false, keys: [] };
  return { quit: false, keys: Array.from(chunk, (ch) => ch.toLowerCase()) };
}
