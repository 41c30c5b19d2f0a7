/**
 * Calendar window used by the birthday query
 *
 * months and days are collected independently over every date in
 * [today, today + days] (inclusive, local calendar). Filtering on
 * month IN months AND day IN days is therefore coarse: when the window
 * crosses a month boundary some dates outside it also match.
 */
export interface FutureWindow {
  months: Set<number>;
  days: Set<number>;
}

export function futureWindow(days: number, today: Date = new Date()): FutureWindow {
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`days must be a non-negative integer, got ${days}`);
  }

  const months = new Set<number>();
  const dayNumbers = new Set<number>();

  // Walk calendar days, not 24h steps, so DST changes cannot skip a date
  const cursor = new Date(today.getFullYear(), today.getMonth(), today.getDate());
  for (let offset = 0; offset <= days; offset++) {
    months.add(cursor.getMonth() + 1);
    dayNumbers.add(cursor.getDate());
    cursor.setDate(cursor.getDate() + 1);
  }

  return { months, days: dayNumbers };
}
