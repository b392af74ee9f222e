export function getEnv(name: string): string | null {
  const v = typeof process !== 'undefined' ? process.env[name] : undefined;
  return v && v.length > 0 ? v : null;
}

export function envFlag(name: string): boolean {
  return getEnv(name) === '1';
}

// Integer from the environment, or the fallback when unset or unparsable
export function envInt(name: string, fallback: number): number {
  const v = getEnv(name);
  if (v === null) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : fallback;
}
