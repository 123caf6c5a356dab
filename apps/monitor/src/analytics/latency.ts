export function avg(values: number[]): number | null {
  const clean = values.filter((v) => Number.isFinite(v) && v >= 0);
  if (clean.length === 0) return null;
  return Math.round(clean.reduce((acc, v) => acc + v, 0) / clean.length);
}

export function percentileFromValues(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  if (!Number.isFinite(p) || p <= 0 || p > 1) return null;

  const sorted = values.filter((v) => Number.isFinite(v)).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  // Nearest rank: ceil(p * N), 0-based.
  const idx = Math.max(0, Math.min(sorted.length - 1, Math.ceil(p * sorted.length) - 1));
  return sorted[idx] ?? null;
}

export function roundPct(value: number): number {
  return Math.round(value * 100) / 100;
}
