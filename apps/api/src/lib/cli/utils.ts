export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). All values are strings. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    const m = /^--([^=]+)(?:=(.*))?$/s.exec(a);
    const key = m?.[1]?.trim();
    if (!key) continue;
    flags[key] = (m?.[2] ?? 'true').trim(); // bare --key => "true"
  }
  return flags;
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const s = flags[key]?.trim();
  return s ? s : undefined;
}

/** Get a number flag. Throws on a value that is not a finite number. */
export function flagNum(flags: Flags, key: string): number | undefined {
  const s = flagStr(flags, key);
  if (s == null) return undefined;
  const n = Number(s);
  if (!Number.isFinite(n)) throw new Error(`--${key} must be a number, got "${s}"`);
  return n;
}

/** Get a required string flag. */
export function requireFlag(flags: Flags, key: string): string {
  const s = flagStr(flags, key);
  if (!s) throw new Error(`--${key} is required`);
  return s;
}
