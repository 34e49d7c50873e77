const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar date (UTC) as `YYYY-MM-DD`. */
export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function isFutureDate(value: string, now: Date = new Date()): boolean {
  return value.slice(0, 10) > todayIso(now);
}

/**
 * Closed-interval overlap on ISO dates. A null end means the range is open.
 * ISO dates compare correctly as strings.
 */
export function rangesOverlap(
  aStart: string,
  aEnd: string | null,
  bStart: string,
  bEnd: string | null,
): boolean {
  const aEndsBeforeB = aEnd !== null && aEnd < bStart;
  const bEndsBeforeA = bEnd !== null && bEnd < aStart;
  return !aEndsBeforeB && !bEndsBeforeA;
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

/** Raw driver rows carry timestamps as Date; anything else passes through as text. */
export function toIsoTimestamp(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}
