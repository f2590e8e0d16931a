/* --------------------- CLI helpers --------------------- */
export function getFlag(args: string[], name: string, def?: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i < 0) return def;
  const v = args[i + 1];
  return v === undefined || v.startsWith('--') ? def : v;
}

/** Arguments left after dropping `--flag` and the values of `valueFlags`. */
export function positionals(args: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith('--')) {
      if (valueFlags.includes(a.slice(2))) i++;
      continue;
    }
    out.push(a);
  }
  return out;
}

const INT_RE = /^-?\d+$/;

export function parseIntArg(raw: string | undefined, name: string): number {
  if (raw === undefined || !INT_RE.test(raw.trim())) throw new RangeError(`${name} must be an integer, got ${JSON.stringify(raw)}`);
  const v = Number(raw.trim());
  if (!Number.isSafeInteger(v)) throw new RangeError(`${name} is too large: ${raw}`);
  return v;
}

export function parseBigArg(raw: string | undefined, name: string): bigint {
  if (raw === undefined || !INT_RE.test(raw.trim())) throw new RangeError(`${name} must be an integer, got ${JSON.stringify(raw)}`);
  return BigInt(raw.trim());
}
