function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
* Trailing sum over `period` values. Emits only when the last `period` samples are all finite.
*/
export function rollingSum(values: Array<number | null>, period: number): Array<number | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error(`rollingSum period must be a positive integer, got ${period}`);
  }

  const out: Array<number | null> = new Array(values.length).fill(null);
  let sum = 0;
  let count = 0;

  for (let i = 0; i < values.length; i += 1) {
    const v = values[i];
    if (isFiniteNumber(v)) {
      sum += v;
      count += 1;
    }

    const dropIndex = i - period;
    if (dropIndex >= 0) {
      const drop = values[dropIndex];
      if (isFiniteNumber(drop)) {
        sum -= drop;
        count -= 1;
      }
    }

    if (i >= period - 1 && count === period) {
      out[i] = sum;
    }
  }

  return out;
}
