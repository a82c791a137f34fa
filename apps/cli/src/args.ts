/**
 * Minimal argv parser: `<command> [positionals...] [--flag value | --flag=value | --switch]`.
 */

export type FlagValue = string | boolean;

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, FlagValue>;
}

/** Flags that never take a value */
const SWITCHES: ReadonlySet<string> = new Set(['no-llm-keywords', 'report', 'help']);

const SHORT_FLAGS: Readonly<Record<string, string>> = {
  m: 'model',
  r: 'report',
  h: 'help',
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, FlagValue> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let name: string | undefined;
    let inlineValue: string | undefined;
    if (arg.startsWith('--') && arg.length > 2) {
      const eq = arg.indexOf('=');
      name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
    } else if (/^-[a-zA-Z]$/.test(arg)) {
      name = SHORT_FLAGS[arg.slice(1)] ?? arg.slice(1);
    }

    if (name === undefined) {
      positionals.push(arg);
      continue;
    }

    if (inlineValue !== undefined) {
      flags[name] = inlineValue;
    } else if (SWITCHES.has(name)) {
      flags[name] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        flags[name] = next;
        i++;
      } else {
        flags[name] = true;
      }
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

export function stringFlag(flags: Record<string, FlagValue>, name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Integer flag value; undefined when absent, NaN-free.
 */
export function intFlag(flags: Record<string, FlagValue>, name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new UsageError(`--${name} expects an integer, got "${value}"`);
  }
  return parsed;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
