const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Truncate toward zero and group thousands: `1234567.9` → `1,234,567` */
export function formatNumber(value: number): string {
  // `+ 0` folds -0 into 0
  return integerFormat.format(Math.trunc(value) + 0);
}

/** Like `formatNumber`, with an explicit `+` on zero and positive values */
export function formatDelta(value: number): string {
  const truncated = Math.trunc(value) + 0;
  return truncated >= 0 ? `+${formatNumber(truncated)}` : formatNumber(truncated);
}

/** One decimal below 1,000, grouped whole numbers from there on */
export function formatRate(value: number): string {
  return value >= 1000 ? formatNumber(value) : value.toFixed(1);
}

export function formatSigned(value: number, fractionDigits: number): string {
  const fixed = value.toFixed(fractionDigits);
  return value >= 0 ? `+${fixed}` : fixed;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** `[T+005.0s]` style offset from the session start */
export function formatElapsed(elapsedMs: number): string {
  return `[T+${(elapsedMs / 1000).toFixed(1).padStart(5, '0')}s]`;
}

export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function yesNo(value: boolean): string {
  return value ? 'YES' : 'NO';
}
