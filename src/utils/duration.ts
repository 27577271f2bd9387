export class InvalidDurationError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'InvalidDurationError';
  }
}

const SECONDS_PER_UNIT: ReadonlyMap<string, number> = new Map([
  ['s', 1],
  ['sec', 1],
  ['second', 1],
  ['seconds', 1],
  ['m', 60],
  ['min', 60],
  ['minute', 60],
  ['minutes', 60],
  ['h', 3600],
  ['hour', 3600],
  ['hours', 3600],
  ['d', 86400],
  ['day', 86400],
  ['days', 86400],
  ['w', 604800],
  ['week', 604800],
  ['weeks', 604800],
  // Months and years are fixed 30 / 365 day spans, not calendar-aware
  ['mon', 2592000],
  ['month', 2592000],
  ['months', 2592000],
  ['y', 31536000],
  ['year', 31536000],
  ['years', 31536000],
]);

/**
 * Parse a retention string such as "30s", "1d", "2w", "6mon" into seconds
 */
export function parseDuration(input: string): number {
  const normalized = input.trim().toLowerCase();

  if (normalized === '') {
    throw new InvalidDurationError('Duration string cannot be empty', input);
  }

  const match = /^(\d*)(.*)$/.exec(normalized);
  const digits = match?.[1] ?? '';
  const unit = match?.[2] ?? '';

  if (digits === '') {
    throw new InvalidDurationError(
      `Invalid duration format: '${input}'. Expected format like '1d', '2w', '30m', '3600s'`,
      input
    );
  }

  if (unit === '') {
    throw new InvalidDurationError(
      `Missing time unit in duration '${input}'. Supported: s, m, h, d, w, mon, y`,
      input
    );
  }

  const unitSeconds = SECONDS_PER_UNIT.get(unit);
  if (unitSeconds === undefined) {
    throw new InvalidDurationError(
      `Unknown time unit '${unit}'. Supported: s, m, h, d, w, mon, y (e.g., '1d', '2w', '30m')`,
      input
    );
  }

  const amount = Number(digits);
  if (!Number.isSafeInteger(amount * unitSeconds)) {
    throw new InvalidDurationError(`Duration '${input}' is too large`, input);
  }

  return amount * unitSeconds;
}
