export function nowIso(): string {
  return new Date().toISOString();
}

/** `YYYY-MM-DD` (UTC) of an ISO timestamp. */
export function isoDate(iso: string): string {
  return iso.slice(0, 10);
}

/** Months since 0000-01 for a `YYYY-MM` or `YYYY-MM-DD` string. */
export function monthIndex(value: string): number {
  const [y, m] = value.split("-");
  return Number(y) * 12 + (Number(m) - 1);
}

export function addMinutes(iso: string, minutes: number): string {
  return new Date(Date.parse(iso) + minutes * 60_000).toISOString();
}
