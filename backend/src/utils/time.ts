const RFC3339_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T([01]\d|2[0-3]):([0-5]\d):([0-5]\d|60)(\.\d+)?([zZ]|[+\-]\d{2}:\d{2})$/;

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

const isRealCalendarDate = (year: number, month: number, day: number): boolean => {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
};

/**
 * Date key (YYYY-MM-DD) of an RFC 3339 timestamp in the offset it was written
 * with, so "2026-10-19T18:00:00-05:00" keys to 2026-10-19 regardless of host zone.
 * Returns null for anything that does not parse.
 */
export const dateKeyFromRfc3339 = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const match = value.trim().match(RFC3339_PATTERN);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  if (!isRealCalendarDate(Number(year), Number(month), Number(day))) {
    return null;
  }
  if (parseIsoTimeToMs(value) === null) {
    return null;
  }
  return `${year}-${month}-${day}`;
};

export const dateKeyInTimeZone = (value: Date | string | number = new Date(), timeZone: string | null = null): string | null => {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  const formatWithZone = (zone: string | null): string | null => {
    try {
      const formatter = new Intl.DateTimeFormat('en-US', {
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        ...(zone ? { timeZone: zone } : {}),
      });
      const parts = formatter.formatToParts(date);
      const year = parts.find((part) => part.type === 'year')?.value;
      const month = parts.find((part) => part.type === 'month')?.value;
      const day = parts.find((part) => part.type === 'day')?.value;
      if (!year || !month || !day) {
        return null;
      }
      // MM/DD/YYYY -> YYYY-MM-DD
      return `${year}-${month}-${day}`;
    } catch {
      return null;
    }
  };

  const normalizedTimeZone = typeof timeZone === 'string' ? timeZone.trim() : '';
  return formatWithZone(normalizedTimeZone || null) || formatWithZone('UTC') || date.toISOString().slice(0, 10);
};

/** Host-local calendar date key for "today". */
export const localDateKey = (now: Date = new Date()): string => {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
};

/** "2026-10-19" -> "Mon Oct 19" */
export const formatDayLabel = (dateKey: string): string => {
  const parsed = new Date(`${dateKey}T12:00:00Z`);
  if (Number.isNaN(parsed.getTime())) {
    return dateKey;
  }
  const parts = new Intl.DateTimeFormat('en-US', {
    weekday: 'short',
    month: 'short',
    day: 'numeric',
    timeZone: 'UTC',
  }).formatToParts(parsed);
  const weekday = parts.find((part) => part.type === 'weekday')?.value;
  const month = parts.find((part) => part.type === 'month')?.value;
  const day = parts.find((part) => part.type === 'day')?.value;
  if (!weekday || !month || !day) {
    return dateKey;
  }
  return `${weekday} ${month} ${day}`;
};
