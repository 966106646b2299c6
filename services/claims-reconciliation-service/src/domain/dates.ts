export const MS_PER_DAY = 86_400_000;

// Anything before this year is a placeholder from the practice-management system.
const PLACEHOLDER_YEAR_CEILING = 1901;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ZONELESS_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;

export type DateParseResult = { ok: true; value: Date | null } | { ok: false; reason: string };

function fromParts(parts: string[]): DateParseResult {
  const [year, month, day, hour = '0', minute = '0', second = '0', millis = '0'] = parts;
  const y = Number(year);
  if (y < PLACEHOLDER_YEAR_CEILING) {
    return { ok: true, value: null };
  }

  const value = new Date(
    Date.UTC(y, Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second), Number(millis.padEnd(3, '0')))
  );
  if (value.getUTCMonth() !== Number(month) - 1 || value.getUTCDate() !== Number(day)) {
    return { ok: false, reason: 'calendar date does not exist' };
  }
  return { ok: true, value };
}

/**
 * Reads a source date or timestamp. Zoneless values are taken as UTC and
 * placeholder dates (0001-01-01, 0000-00-00, ...) come back as null.
 */
export function parseSourceDate(input: string | Date): DateParseResult {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      return { ok: false, reason: 'invalid date' };
    }
    return { ok: true, value: input.getUTCFullYear() < PLACEHOLDER_YEAR_CEILING ? null : new Date(input.getTime()) };
  }

  const text = input.trim();
  if (text === '') {
    return { ok: true, value: null };
  }

  const dateOnly = DATE_ONLY.exec(text);
  if (dateOnly) {
    return fromParts(dateOnly.slice(1));
  }

  const zoneless = ZONELESS_TIMESTAMP.exec(text);
  if (zoneless) {
    return fromParts(zoneless.slice(1).map((part) => part ?? '0'));
  }

  const parsed = Date.parse(text);
  if (Number.isNaN(parsed)) {
    return { ok: false, reason: `unparseable date '${text}'` };
  }
  const value = new Date(parsed);
  return { ok: true, value: value.getUTCFullYear() < PLACEHOLDER_YEAR_CEILING ? null : value };
}

export const startOfUtcDay = (date: Date): number =>
  Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

export const isSameUtcDay = (left: Date, right: Date): boolean => startOfUtcDay(left) === startOfUtcDay(right);

export const isWithinRange = (date: Date, range: { min: Date; max: Date }): boolean =>
  date.getTime() >= range.min.getTime() && date.getTime() <= range.max.getTime();

export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const compareDates = (left: Date | null, right: Date | null): number => {
  if (left === null && right === null) return 0;
  if (left === null) return -1;
  if (right === null) return 1;
  return left.getTime() - right.getTime();
};
