import { ConfigurationError } from '../errors.js';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Longest delay a Node timer honours; larger values fire after 1 ms */
export const MAX_DURATION_MS = 2_147_483_647;

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/gy;

/**
 * Parses a polling interval such as "1s", "500ms", "1m30s" or "1.5s" into
 * milliseconds. Bare numbers are taken as milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`Invalid duration: ${value}`);
    }
    return withinTimerRange(value, String(value));
  }

  const input = value.trim();
  if (input === '') {
    throw new ConfigurationError('Invalid duration: empty value');
  }
  if (/^\d+(\.\d+)?$/.test(input)) {
    return withinTimerRange(Number.parseFloat(input), value);
  }

  SEGMENT.lastIndex = 0;
  let total = 0;
  let consumed = 0;
  let match: RegExpExecArray | null = SEGMENT.exec(input);
  while (match !== null) {
    const [whole, amount, unit] = match;
    total += Number.parseFloat(amount) * UNIT_MS[unit];
    consumed += whole.length;
    match = SEGMENT.exec(input);
  }

  if (consumed === 0 || consumed !== input.length) {
    throw new ConfigurationError(
      `Invalid duration "${value}". Use forms like 500ms, 1s, 1m30s.`
    );
  }
  return withinTimerRange(total, value);
}

function withinTimerRange(ms: number, source: string): number {
  if (ms > MAX_DURATION_MS) {
    throw new ConfigurationError(
      `Duration "${source}" is too long; the maximum is ${MAX_DURATION_MS}ms (about 24.8 days).`
    );
  }
  return ms;
}

/** Splits a comma-separated rule list, dropping blank entries */
export function splitRuleList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((rule) => rule.trim())
    .filter((rule) => rule.length > 0);
}
