const UNIT_SECONDS: Record<string, number> = { h: 3600, m: 60, s: 1 };

/**
 * Parse a Vault duration (seconds as a number, "61", "61s" or "1m1s")
 * into whole seconds.
 */
export function parseDurationSeconds(value: number | string): number {
  if (typeof value === "number") {
    return value;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const pattern = /(\d+)([hms])/g;
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(pattern)) {
    total += Number(match[1]) * UNIT_SECONDS[match[2]];
    consumed += match[0].length;
  }

  if (consumed === 0 || consumed !== trimmed.length) {
    throw new Error(`Invalid duration: "${value}"`);
  }
  return total;
}
