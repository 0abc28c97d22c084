/**
 * UTC calendar-day helpers. Forecast dates and daily aggregates are keyed by UTC day.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function parseIsoDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

export function startOfUtcDay(date: Date): Date {
  return parseIsoDate(toIsoDate(date));
}

/**
 * Last millisecond of the UTC day containing `date`
 */
export function endOfUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS - 1);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(isoDate).getTime() + days * DAY_MS));
}

/**
 * Every UTC date from `from` to `to` inclusive
 */
export function eachIsoDate(from: Date, to: Date): string[] {
  const dates: string[] = [];
  const last = toIsoDate(to);
  for (let day = toIsoDate(from); day <= last; day = addDays(day, 1)) {
    dates.push(day);
  }
  return dates;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}
