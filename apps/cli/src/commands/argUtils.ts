import { CliUsageError } from '../errors.js';

export function normalize(value?: string | null): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} option requires a value`);
  }
  return value;
}

const DECIMAL_INTEGER = /^\d+$/;

export function parseInteger(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!DECIMAL_INTEGER.test(raw) || !Number.isSafeInteger(value) || value < min) {
    throw new CliUsageError(`${flag} expects an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export function parseDecimal(flag: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < min || value > max) {
    throw new CliUsageError(`${flag} expects a number between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

export function parseFormat(raw: string): 'text' | 'json' {
  const format = raw.toLowerCase();
  if (format !== 'text' && format !== 'json') {
    throw new CliUsageError(`--format expects 'text' or 'json', got '${raw}'`);
  }
  return format;
}
