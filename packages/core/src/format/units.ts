/**
 * Human-readable formatting of benchmark values.
 *
 * The unit of a benchmark decides how its samples are rendered:
 * - `second`: scaled to sec/ms/us/ns from the first value, three
 *   significant digits for that value, the same scale for the others
 * - `byte`: bytes, kB or MB
 * - `integer`: rounded to an integer
 * - `number`: three significant digits below 100, no decimals above
 */

export const BENCHMARK_UNITS = ['second', 'byte', 'integer', 'number'] as const;
export type BenchmarkUnit = (typeof BENCHMARK_UNITS)[number];

const TIMEDELTA_UNITS = ['sec', 'ms', 'us', 'ns'] as const;

export function isBenchmarkUnit(value: unknown): value is BenchmarkUnit {
  return (
    typeof value === 'string' &&
    (BENCHMARK_UNITS as readonly string[]).includes(value)
  );
}

function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

export function formatTimedeltas(values: readonly number[]): string[] {
  const first = values[0];
  if (first === undefined) return [];

  const ref = Math.abs(first);
  let exponent = -9;
  for (let candidate = 2; candidate >= -8; candidate -= 1) {
    if (ref >= 10 ** candidate) {
      exponent = candidate;
      break;
    }
  }

  const precision = 2 - floorMod(exponent, 3);
  const scale = exponent < 0 ? -Math.floor(exponent / 3) : 0;
  const factor = 10 ** (scale * 3);
  const unit = TIMEDELTA_UNITS[scale] ?? 'ns';
  return values.map((value) => `${(value * factor).toFixed(precision)} ${unit}`);
}

export function formatTimedelta(value: number): string {
  return formatTimedeltas([value])[0] ?? String(value);
}

export function formatFilesize(size: number): string {
  if (size < 10 * 1024) {
    return size === 1 ? '1 byte' : `${size.toFixed(0)} bytes`;
  }
  if (size > 10 * 1024 * 1024) {
    return `${(size / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(size / 1024).toFixed(1)} kB`;
}

export function formatInteger(value: number): string {
  return Math.round(value).toFixed(0);
}

export function formatNumber(value: number): string {
  if (Math.abs(value) >= 100) return value.toFixed(0);
  return String(Number(value.toPrecision(3)));
}

export function formatSamples(
  unit: BenchmarkUnit,
  values: readonly number[]
): string[] {
  switch (unit) {
    case 'second':
      return formatTimedeltas(values);
    case 'byte':
      return values.map(formatFilesize);
    case 'integer':
      return values.map(formatInteger);
    case 'number':
      return values.map(formatNumber);
  }
}
