export interface ParsedCLIArgs {
  positionals: string[];
  options: Map<string, string>;
}

/**
 * `--key=value`, `--key value` and bare `--flag` (stored as "true").
 * Keys listed in `booleanFlags` never consume the following token.
 */
export const parseCLIArgs = (
  argv: string[],
  booleanFlags: ReadonlySet<string> = new Set(),
): ParsedCLIArgs => {
  const positionals: string[] = [];
  const options = new Map<string, string>();
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined) {
      continue;
    }
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }
    const eq = token.indexOf('=');
    if (eq >= 0) {
      options.set(token.slice(2, eq), token.slice(eq + 1));
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!booleanFlags.has(key) && next !== undefined && !next.startsWith('--')) {
      options.set(key, next);
      i += 1;
    } else {
      options.set(key, 'true');
    }
  }
  return { positionals, options };
};

export const parseBoolean = (
  raw: string | undefined,
  fallback: boolean,
): boolean => {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`invalid boolean: ${raw}`);
  }
};

export const parsePositiveInt = (
  raw: string | undefined,
  fallback: number,
): number => {
  if (raw === undefined) {
    return fallback;
  }
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`invalid positive number: ${raw}`);
  }
  return Math.floor(n);
};
