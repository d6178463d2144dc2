/**
 * Human-readable byte sizes, 1024-based.
 */

const UNITS = ['B', 'K', 'M', 'G', 'T', 'P'] as const;

const UNIT_FACTORS: Record<string, number> = {
  '': 1,
  B: 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
  P: 1024 ** 5,
};

/**
 * Format a byte count using the largest unit that keeps the mantissa
 * in [1, 1024), e.g. `100.0B`, `1.5K`, `2.0G`.
 */
export function formatBytes(bytes: number, digits = 1): string {
  const abs = Math.abs(bytes);
  let unit = 0;
  while (unit < UNITS.length - 1 && abs >= 1024 ** (unit + 1)) {
    unit++;
  }
  // 1048575 would otherwise print as 1024.0K
  if (unit < UNITS.length - 1 && Number((abs / 1024 ** unit).toFixed(digits)) >= 1024) {
    unit++;
  }
  return `${(bytes / 1024 ** unit).toFixed(digits)}${UNITS[unit] ?? 'B'}`;
}

/**
 * Parse a size such as `512`, `200M`, `10GB`, `1.5 GiB` into bytes.
 *
 * @throws RangeError if the string is not a size
 */
export function parseBytes(input: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([KMGTP]?)(?:I?B)?\s*$/i.exec(input);
  if (!match) {
    throw new RangeError(`Not a size: "${input}"`);
  }

  const value = Number(match[1]);
  const factor = UNIT_FACTORS[(match[2] ?? '').toUpperCase()] ?? 1;
  return Math.floor(value * factor);
}
