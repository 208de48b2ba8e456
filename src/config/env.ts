export type EnvSource = Record<string, string | undefined>;

export function envString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  const trimmed = raw.trim();
  return trimmed === '' ? defaultValue : trimmed;
}

export function envBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '') return defaultValue;
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') return false;
  return defaultValue;
}

export function envInt(
  name: string,
  defaultValue: number,
  opts?: { min?: number; max?: number },
  env: EnvSource = process.env
): number {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  const min = opts?.min;
  const max = opts?.max;
  if (min !== undefined && parsed < min) return min;
  if (max !== undefined && parsed > max) return max;
  return parsed;
}

export function envMs(
  name: string,
  defaultValue: number,
  opts?: { min?: number; max?: number },
  env: EnvSource = process.env
): number {
  // Same parsing as envInt; the name marks the unit.
  return envInt(name, defaultValue, opts, env);
}
