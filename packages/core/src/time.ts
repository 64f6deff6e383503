/** Epoch values above this are taken as milliseconds rather than seconds */
const EPOCH_MS_THRESHOLD = 1e11;

const DOTTED_DATE = /^(\d{4})[.-](\d{2})[.-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;
const DAY_FIRST_DATE = /^(\d{2})\.(\d{2})\.(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

function fromEpoch(value: number): Date {
  return new Date(value > EPOCH_MS_THRESHOLD ? value : value * 1000);
}

function isValid(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse a timestamp from the shapes monitoring tools send.
 *
 * Accepts Date objects, epoch seconds or milliseconds (as numbers or numeric
 * strings), ISO 8601 strings and the zone-less "YYYY.MM.DD HH:mm:ss" /
 * "DD.MM.YYYY HH:mm:ss" forms, which are read as UTC. Returns `null` when the
 * value is empty or unparseable.
 */
export function parseOptionalTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    return fromEpoch(value);
  }

  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (text === '') return null;

  if (/^\d+(\.\d+)?$/.test(text)) {
    return parseOptionalTimestamp(Number(text));
  }

  const dotted = DOTTED_DATE.exec(text);
  if (dotted) {
    const [, y, mo, d, h, mi, s] = dotted.map(Number);
    return utc(y, mo, d, h, mi, s);
  }

  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst) {
    const [, d, mo, y, h, mi, s] = dayFirst.map(Number);
    return utc(y, mo, d, h, mi, s);
  }

  const parsed = new Date(text);
  return isValid(parsed) ? parsed : null;
}

function utc(
  year = NaN,
  month = NaN,
  day = NaN,
  hour = NaN,
  minute = NaN,
  second = NaN,
): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return isValid(date) ? date : null;
}

/**
 * Same as {@link parseOptionalTimestamp} but falls back to `now`
 */
export function parseTimestamp(value: unknown, now: () => Date = () => new Date()): Date {
  return parseOptionalTimestamp(value) ?? now();
}
