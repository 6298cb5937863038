const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Calendar-date key (YYYY-MM-DD) of a Date, read in UTC. */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function fromDateKey(key: string): Date {
  if (!DATE_KEY.test(key)) {
    throw new Error(`Invalid date key: ${key}`);
  }
  return new Date(`${key}T00:00:00.000Z`);
}

/** Builds a `%keyword%` pattern for `LIKE ... ESCAPE '\'`, matching the keyword literally. */
export function containsPattern(keyword: string): string {
  const escaped = keyword.toLowerCase().replace(/[\\%_]/g, (ch) => `\\${ch}`);
  return `%${escaped}%`;
}
