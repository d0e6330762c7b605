/** Returns the date of `now` as YYYY-MM-DD in UTC. */
export function todayDateString(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/** Shifts a YYYY-MM-DD date by whole days, staying in UTC. */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return todayDateString(d);
}
