import { KEY_COUNT } from '@core/cpu/types';
import defaultTable from './keymap.json';

// Host key name -> logical key index (0x0..0xF)
export type KeyMap = ReadonlyMap<string, number>;

export function createKeyMap(table: Record<string, number>): KeyMap {
  const map = new Map<string, number>();
  for (const [name, index] of Object.entries(table)) {
    if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
      throw new Error(`Key map entry '${name}' -> ${index} is not a key index 0..${KEY_COUNT - 1}`);
    }
    map.set(name.toLowerCase(), index);
  }
  return map;
}

export const DEFAULT_KEYMAP: KeyMap = createKeyMap(defaultTable);

// Unmapped names are ignored; result is sorted and de-duplicated
export function mapKeys(map: KeyMap, names: Iterable<string>): number[] {
  const out = new Set<number>();
  for (const n of names) {
    const k = map.get(n.toLowerCase());
    if (k !== undefined) out.add(k);
  }
  return [...out].sort((a, b) => a - b);
}
