export type Env = Readonly<Record<string, string | undefined>>;

export function envBool(
  name: string,
  defaultValue: boolean,
  env: Env = process.env,
): boolean {
  const raw = env[name];
  if (raw === undefined || raw === null) return defaultValue;
  const v = String(raw).trim().toLowerCase();
  if (v === '') return defaultValue;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  return defaultValue;
}

export function envString(
  name: string,
  defaultValue: string,
  env: Env = process.env,
): string {
  const v = (env[name] ?? '').trim();
  return v === '' ? defaultValue : v;
}

/**
 * Comma separated list. Blank items are dropped, order is kept.
 * An unset variable yields `defaultValue`; a set but empty one yields `[]`.
 */
export function envList(
  name: string,
  defaultValue: readonly string[],
  env: Env = process.env,
): string[] {
  const raw = env[name];
  if (raw === undefined) return [...defaultValue];
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function envInt(
  name: string,
  defaultValue: number,
  env: Env = process.env,
): number {
  const v = (env[name] ?? '').trim();
  if (!/^-?\d+$/.test(v)) return defaultValue;
  return Number.parseInt(v, 10);
}
