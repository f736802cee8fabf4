// limits are byte or item counts: either a non-negative integer or Infinity
export function guardLimit(value: number, name: string) {
  if (typeof value !== 'number') {
    throw new TypeError(`${name} must be a number - got ${typeof value}`);
  }
  if (value < 0 || Number.isNaN(value) || (value !== Number.POSITIVE_INFINITY && value % 1)) {
    throw new RangeError(`${name} must be a non-negative integer - got ${value}`);
  }
}
