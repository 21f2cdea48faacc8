const UNITS = [
  { label: "d", ms: 24 * 60 * 60 * 1000 },
  { label: "h", ms: 60 * 60 * 1000 },
  { label: "m", ms: 60 * 1000 },
  { label: "s", ms: 1000 },
] as const;

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

/**
 * Compact display form: the two largest non-zero units.
 * 9_000_000 -> "2h30m", 3_600_000 -> "1h", 86_700_000 -> "1d5m". Lossy; not meant to be parsed back.
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 1000) return "0s";
  let seconds = Math.floor(ms / 1000);

  const parts: number[] = UNITS.map((unit) => {
    const unitSeconds = unit.ms / 1000;
    const value = Math.floor(seconds / unitSeconds);
    seconds -= value * unitSeconds;
    return value;
  });

  const top = parts.findIndex((v) => v > 0);
  let out = `${parts[top]}${UNITS[top].label}`;
  const next = parts.findIndex((v, i) => i > top && v > 0);
  if (next !== -1) {
    out += `${parts[next]}${UNITS[next].label}`;
  }
  return out;
}

export function percentOf(part: number, whole: number): number {
  if (!whole || whole <= 0) return 0;
  return (part / whole) * 100;
}
