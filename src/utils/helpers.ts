export function round(n: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(n * factor) / factor;
}

/** Amounts are in yuan unless another ISO 4217 code is given. */
export function formatCurrency(n: number, currency = 'CNY'): string {
  return new Intl.NumberFormat('zh-CN', { style: 'currency', currency }).format(n);
}

/** Formats a value that is already expressed in percentage points. */
export function formatPercent(n: number | null): string {
  if (n == null || !Number.isFinite(n)) return 'N/A';
  return `${n.toFixed(2)}%`;
}

/** Shortens large magnitudes, e.g. 1_500_000 → "1.50M". */
export function formatLargeNumber(n: number): string {
  const abs = Math.abs(n);
  const sign = n < 0 ? '-' : '';
  if (abs >= 1e9) return `${sign}${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}${(abs / 1e3).toFixed(2)}K`;
  return `${sign}${abs.toFixed(2)}`;
}
