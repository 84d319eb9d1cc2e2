import { ConfigError } from './errors';
import { parseIsoDay } from './dates';

/**
 * Collect `--name value` pairs. Flags outside `allowed` or missing a value are rejected.
 */
export function parseFlags(args: string[], allowed: readonly string[]): Record<string, string> {
  const flags: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      throw new ConfigError([`Unexpected argument: ${arg}`]);
    }

    const name = arg.slice(2);
    if (!allowed.includes(name)) {
      throw new ConfigError([`Unknown option: ${arg} (expected one of ${allowed.map(flag => `--${flag}`).join(', ')})`]);
    }
    if (i + 1 >= args.length) {
      throw new ConfigError([`Missing value for ${arg}`]);
    }

    flags[name] = args[i + 1];
    i++; // Skip the value
  }

  return flags;
}

/**
 * Parse a `YYYY-MM-DD` processing date into midnight UTC of that day.
 */
export function parseIsoDate(value: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new ConfigError([`Invalid date format "${value}". Please use YYYY-MM-DD`]);
  }

  const date = parseIsoDay(value);
  if (!date) {
    throw new ConfigError([`Invalid date "${value}"`]);
  }
  return date;
}

export function parsePositiveNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError([`--${name} must be a positive number, got "${value}"`]);
  }
  return parsed;
}

export function parsePositiveInteger(name: string, value: string): number {
  const parsed = parsePositiveNumber(name, value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError([`--${name} must be a whole number, got "${value}"`]);
  }
  return parsed;
}
