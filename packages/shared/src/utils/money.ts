function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function fromCents(cents: number): number {
  return cents / 100;
}

function addMoney(...amounts: number[]): number {
  const totalCents = amounts.reduce((sum, amt) => sum + toCents(amt), 0);
  return fromCents(totalCents);
}

function subtractMoney(a: number, b: number): number {
  return fromCents(toCents(a) - toCents(b));
}

/**
 * Postgres `numeric` comes back from postgres.js as a string, and SUM over
 * no rows as null.
 */
function parseMoney(value: string | number | null | undefined): number {
  if (value === null || value === undefined || value === '') return 0;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? fromCents(toCents(n)) : 0;
}

/** Fixed two-decimal string for `numeric(12,2)` columns. */
function toMoneyString(amount: number): string {
  return (toCents(amount) / 100).toFixed(2);
}

export { toCents, fromCents, addMoney, subtractMoney, parseMoney, toMoneyString };
