export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function ratio(value: number, base: number): number {
  if (base <= 0) {
    return 0;
  }
  return clamp(value / base, 0, 1);
}

export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

export function variance(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mu = mean(values);
  let acc = 0;
  for (const value of values) {
    acc += (value - mu) * (value - mu);
  }
  return acc / values.length;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** log10(1 + x): keeps ordering, maps 0 to 0, compresses heavy tails. */
export function log1pBase10(value: number): number {
  if (!Number.isFinite(value) || value <= -1) {
    return 0;
  }
  return Math.log1p(value) / Math.LN10;
}

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}
