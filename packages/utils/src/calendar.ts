// UTC calendar helpers; all engine timestamps are epoch milliseconds in UTC.

export function monthIndex(timestamp: number): number {
  const date = new Date(timestamp);
  return date.getUTCFullYear() * 12 + date.getUTCMonth();
}

export function quarterIndex(timestamp: number): number {
  const date = new Date(timestamp);
  return date.getUTCFullYear() * 4 + Math.floor(date.getUTCMonth() / 3);
}

export function dayOfMonth(timestamp: number): number {
  return new Date(timestamp).getUTCDate();
}

export function daysInMonth(timestamp: number): number {
  const date = new Date(timestamp);
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)).getUTCDate();
}

export function isoDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}
