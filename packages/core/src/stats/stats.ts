export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('mean() requires a non-empty array');
  }
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

export function min(values: readonly number[]): number {
  const [first] = values;
  if (first === undefined) {
    throw new Error('min() requires a non-empty array');
  }
  let lowest = first;
  for (const value of values) if (value < lowest) lowest = value;
  return lowest;
}

export function max(values: readonly number[]): number {
  const [first] = values;
  if (first === undefined) {
    throw new Error('max() requires a non-empty array');
  }
  let highest = first;
  for (const value of values) if (value > highest) highest = value;
  return highest;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('median() requires a non-empty array');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Sample standard deviation (n - 1 denominator).
 */
export function stdev(values: readonly number[]): number {
  if (values.length < 2) {
    throw new Error('stdev() requires at least two values');
  }
  const center = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - center) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}
