/**
 * Cumulative trapezoidal integral of samples spaced `width` apart.
 * result[0] = initial, result[i] = result[i-1] + width * (y[i-1] + y[i]) / 2
 */
export function cumulativeTrapezoid(y: number[], width: number, initial: number = 0): number[] {
  const result = new Array<number>(y.length).fill(0);
  if (y.length === 0) return result;

  result[0] = initial;
  for (let i = 1; i < y.length; i++) {
    result[i] = result[i - 1] + width * (y[i - 1] + y[i]) / 2;
  }
  return result;
}

/** Elementwise target[i] += source[i] */
export function addInto(target: number[], source: number[]): void {
  for (let i = 0; i < target.length; i++) {
    target[i] += source[i];
  }
}

export interface IExtremes {
  max: number;
  min: number;
  maxIndex: number;
  minIndex: number;
}

/** Max/min of a sample array; ties resolve to the first index */
export function findExtremes(values: number[]): IExtremes {
  let max = -Infinity;
  let min = Infinity;
  let maxIndex = -1;
  let minIndex = -1;

  for (let i = 0; i < values.length; i++) {
    if (values[i] > max) {
      max = values[i];
      maxIndex = i;
    }
    if (values[i] < min) {
      min = values[i];
      minIndex = i;
    }
  }

  if (maxIndex === -1) {
    return { max: 0, min: 0, maxIndex: -1, minIndex: -1 };
  }
  return { max, min, maxIndex, minIndex };
}
