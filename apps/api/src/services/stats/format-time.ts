const UNITS: ReadonlyArray<readonly [name: string, seconds: number]> = [
  ['day', 86_400],
  ['hour', 3_600],
  ['minute', 60],
  ['second', 1],
];

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/** "1 hour, 2 minutes": the two largest non-zero units. */
export function formatDuration(totalSeconds: number): string {
  let remaining = Math.max(0, Math.floor(totalSeconds));
  const parts: string[] = [];
  for (const [unit, size] of UNITS) {
    const count = Math.floor(remaining / size);
    remaining -= count * size;
    if (count > 0) parts.push(plural(count, unit));
    if (parts.length === 2) break;
  }
  return parts.length > 0 ? parts.join(', ') : plural(0, 'second');
}

/** "5 minutes ago", in the largest whole unit. */
export function formatAgo(pastSeconds: number, nowSeconds: number): string {
  const diff = Math.floor(nowSeconds - pastSeconds);
  if (diff < 1) return 'just now';
  for (const [unit, size] of UNITS) {
    if (diff >= size) return `${plural(Math.floor(diff / size), unit)} ago`;
  }
  return 'just now';
}
