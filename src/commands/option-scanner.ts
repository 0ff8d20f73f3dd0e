/**
 * Option scanning for peel's command line.
 *
 * Value options take `--long value`, `--long=value`, `-s value` and
 * `-svalue`. Values may start with "-" (passwords do) unless they are a
 * known flag. Everything after `--` is an operand.
 */

export interface ValueOption {
  /** Canonical spelling, used in messages */
  long: string;
  aliases?: readonly string[];
  /** Single letter, without the dash */
  short?: string;
}

export interface ScannedValue {
  /** Last value given; earlier occurrences are dropped */
  value?: string;
  /** The option appeared at least once without a usable value */
  missing: boolean;
  remaining: string[];
}

export function splitAtSeparator(args: readonly string[]): {
  options: readonly string[];
  operands: readonly string[];
} {
  const separator = args.indexOf('--');
  if (separator === -1) return { options: args, operands: [] };
  return { options: args.slice(0, separator), operands: args.slice(separator + 1) };
}

function isKnownFlag(token: string, knownFlags: readonly string[]): boolean {
  return knownFlags.some((flag) => token === flag || token.startsWith(`${flag}=`));
}

type Match = { kind: 'separate' } | { kind: 'attached'; value: string };

function matchToken(token: string, option: ValueOption): Match | null {
  const longs = [option.long, ...(option.aliases ?? [])];
  if (longs.includes(token)) return { kind: 'separate' };
  for (const long of longs) {
    if (token.startsWith(`${long}=`)) {
      return { kind: 'attached', value: token.slice(long.length + 1) };
    }
  }
  if (option.short) {
    const short = `-${option.short}`;
    if (token === short) return { kind: 'separate' };
    if (token.startsWith(short) && !token.startsWith('--')) {
      return { kind: 'attached', value: token.slice(short.length) };
    }
  }
  return null;
}

/** Remove every occurrence of `option` from `args`. */
export function scanValueOption(
  args: readonly string[],
  option: ValueOption,
  knownFlags: readonly string[]
): ScannedValue {
  const remaining: string[] = [];
  let value: string | undefined;
  let missing = false;

  for (let i = 0; i < args.length; i++) {
    const match = matchToken(args[i], option);
    if (!match) {
      remaining.push(args[i]);
      continue;
    }
    if (match.kind === 'attached') {
      if (match.value.trim()) value = match.value;
      else missing = true;
      continue;
    }
    const next = args[i + 1];
    if (next === undefined || next === '' || next === '--' || isKnownFlag(next, knownFlags)) {
      missing = true;
      continue;
    }
    value = next;
    i++;
  }

  return { value, missing, remaining };
}

/** True if any of `flags` appears before `--`. */
export function hasAnyFlag(args: readonly string[], flags: readonly string[]): boolean {
  return splitAtSeparator(args).options.some((arg) => flags.includes(arg));
}
