/**
 * Round a currency amount to two fractional digits, matching a DECIMAL(10,2) column.
 */
export function roundMoney(amount: number): number {
  const rounded = Math.round((Math.abs(amount) + Number.EPSILON) * 100) / 100;
  return amount < 0 ? -rounded : rounded;
}

export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}

/**
 * pg returns NUMERIC columns as strings; absent values stay null.
 */
export function parseNumeric(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isNaN(parsed) ? null : parsed;
}
