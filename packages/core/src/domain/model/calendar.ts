function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date of `date` as `YYYY-MM-DD`. */
export function toLocalDateKey(date: Date): string {
  return `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local hour bucket of `date` as `YYYY-MM-DD HH:00`. */
export function toLocalHourKey(date: Date): string {
  return `${toLocalDateKey(date)} ${pad(date.getHours())}:00`;
}
